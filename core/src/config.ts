/**
 * Image size limits shared by every constructor and by resize.
 */
export const IMAGE_LIMITS = {
  /** Maximum total pixel count (256 megapixels) */
  MAX_PIXELS: 268435456,
} as const;
