/**
 * Embedded Page Images
 *
 * Decoded image objects as pdf.js hands them over (raw pixels plus an
 * ImageKind), converted to RGBA and encoded as PNG on an @napi-rs/canvas
 * surface.
 */

import { z } from 'zod';
import type { CanvasModule } from './render.js';

// =============================================================================
// Decoded Images
// =============================================================================

/**
 * Pixel layouts pdf.js decodes images into
 */
export const ImageKind = {
  GRAYSCALE_1BPP: 1,
  RGB_24BPP: 2,
  RGBA_32BPP: 3,
} as const;

export type ImageKind = (typeof ImageKind)[keyof typeof ImageKind];

const PixelDataSchema = z.union([z.instanceof(Uint8ClampedArray), z.instanceof(Uint8Array)]);

/**
 * An image object with raw pixel data. Objects pdf.js hands over as bitmaps
 * have no `data` and do not match.
 */
export const DecodedImageSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  kind: z.number().int().optional(),
  data: PixelDataSchema,
});

export type DecodedImage = z.infer<typeof DecodedImageSchema>;

// =============================================================================
// Conversion
// =============================================================================

/**
 * Expand a decoded image to RGBA. Returns undefined for an unknown kind or
 * when the data is shorter than the dimensions need.
 */
export function toRgba(image: DecodedImage): Uint8ClampedArray | undefined {
  const { width, height, data } = image;
  const pixels = width * height;
  const rgba = new Uint8ClampedArray(pixels * 4);

  switch (image.kind) {
    case ImageKind.GRAYSCALE_1BPP: {
      // Rows are padded to whole bytes; a set bit is white
      const rowBytes = Math.ceil(width / 8);
      if (data.length < rowBytes * height) {
        return undefined;
      }
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          const byte = data[y * rowBytes + (x >> 3)] ?? 0;
          const value = byte & (0x80 >> (x & 7)) ? 255 : 0;
          const offset = (y * width + x) * 4;
          rgba[offset] = value;
          rgba[offset + 1] = value;
          rgba[offset + 2] = value;
          rgba[offset + 3] = 255;
        }
      }
      return rgba;
    }

    case ImageKind.RGB_24BPP: {
      if (data.length < pixels * 3) {
        return undefined;
      }
      for (let i = 0; i < pixels; i++) {
        rgba[i * 4] = data[i * 3] ?? 0;
        rgba[i * 4 + 1] = data[i * 3 + 1] ?? 0;
        rgba[i * 4 + 2] = data[i * 3 + 2] ?? 0;
        rgba[i * 4 + 3] = 255;
      }
      return rgba;
    }

    case ImageKind.RGBA_32BPP: {
      if (data.length < pixels * 4) {
        return undefined;
      }
      rgba.set(data.subarray(0, pixels * 4));
      return rgba;
    }

    default:
      return undefined;
  }
}

/**
 * Encode RGBA pixels as PNG
 */
export function encodePng(
  canvasModule: CanvasModule,
  rgba: Uint8ClampedArray,
  width: number,
  height: number
): Buffer {
  const canvas = canvasModule.createCanvas(width, height);
  const context = canvas.getContext('2d');
  const imageData = context.createImageData(width, height);
  imageData.data.set(rgba);
  context.putImageData(imageData, 0, 0);
  return canvas.toBuffer('image/png');
}
