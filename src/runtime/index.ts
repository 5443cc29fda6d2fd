export * from './lightField';
export * from './lightingConfig';
export * from './logger';
export * from './lruCache';
