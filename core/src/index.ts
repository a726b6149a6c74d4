export * from './types';
export * from './errors';
export * from './config';
export * from './imaging/color';
export * from './imaging/decode';
export * from './imaging/region';
export * from './imaging/resize';
export * from './imaging/resample';
export { PixelBuffer } from './imaging/pixel-buffer';
