export * from './caveGenerator';
export * from './colorBlend';
export * from './decayGrid';
export * from './errors';
export * from './frame';
export * from './normalize';
export * from './scratchPool';
export * from './subpixel';
export * from './sweep';
export type * from './types';
