import type { PackedImage, PlaneData, RawFrame } from '../types';
import { FrameFormatError } from './errors';

/**
 * Fresh 1x1 black image, used in place of a frame that carries no pixels.
 */
export const emptyImage = (): PackedImage => ({
  width: 1,
  height: 1,
  data: new Uint8Array(3),
});

const chromaSize = (width: number, height: number) => ({
  width: Math.ceil(width / 2),
  height: Math.ceil(height / 2),
});

const checkPlane = (
  name: string,
  plane: PlaneData,
  width: number,
  height: number
): void => {
  if (plane.pixelStride < 1 || plane.rowStride < (width - 1) * plane.pixelStride + 1) {
    throw new FrameFormatError(
      `${name} plane stride (row ${plane.rowStride}, pixel ${plane.pixelStride}) is too small for width ${width}`
    );
  }
  // the last row may stop right after its last sample
  const required = (height - 1) * plane.rowStride + (width - 1) * plane.pixelStride + 1;
  if (plane.bytes.length < required) {
    throw new FrameFormatError(
      `${name} plane holds ${plane.bytes.length} bytes, ${width}x${height} needs ${required}`
    );
  }
};

/**
 * Repacks the three planes into a single NV21 buffer: all luma rows without
 * padding, then the chroma samples interleaved V first, U second.
 */
export const toNv21 = (frame: RawFrame): Uint8Array => {
  const { width, height, planes } = frame;
  if (!planes) {
    throw new FrameFormatError('Frame has no pixel data');
  }
  const [luma, chromaU, chromaV] = planes;
  const chroma = chromaSize(width, height);

  checkPlane('Luma', luma, width, height);
  checkPlane('Chroma U', chromaU, chroma.width, chroma.height);
  checkPlane('Chroma V', chromaV, chroma.width, chroma.height);

  const lumaSize = width * height;
  const nv21 = new Uint8Array(lumaSize + 2 * chroma.width * chroma.height);

  for (let row = 0; row < height; row++) {
    const rowStart = row * luma.rowStride;
    if (luma.pixelStride === 1) {
      nv21.set(luma.bytes.subarray(rowStart, rowStart + width), row * width);
    } else {
      for (let col = 0; col < width; col++) {
        nv21[row * width + col] = luma.bytes[rowStart + col * luma.pixelStride];
      }
    }
  }

  let out = lumaSize;
  for (let row = 0; row < chroma.height; row++) {
    for (let col = 0; col < chroma.width; col++) {
      nv21[out++] = chromaV.bytes[row * chromaV.rowStride + col * chromaV.pixelStride];
      nv21[out++] = chromaU.bytes[row * chromaU.rowStride + col * chromaU.pixelStride];
    }
  }

  return nv21;
};

const clampByte = (value: number): number => {
  const rounded = Math.round(value);
  return rounded < 0 ? 0 : rounded > 255 ? 255 : rounded;
};

/**
 * NV21 to interleaved RGB with full-range BT.601 (JFIF) coefficients.
 */
export const decodeNv21 = (nv21: Uint8Array, width: number, height: number): PackedImage => {
  const chroma = chromaSize(width, height);
  const lumaSize = width * height;
  const expected = lumaSize + 2 * chroma.width * chroma.height;
  if (nv21.length < expected) {
    throw new FrameFormatError(`NV21 buffer holds ${nv21.length} bytes, expected ${expected}`);
  }

  const data = new Uint8Array(lumaSize * 3);
  for (let row = 0; row < height; row++) {
    const chromaRow = lumaSize + (row >> 1) * chroma.width * 2;
    for (let col = 0; col < width; col++) {
      const y = nv21[row * width + col];
      const offset = chromaRow + (col >> 1) * 2;
      const v = nv21[offset] - 128;
      const u = nv21[offset + 1] - 128;

      const target = (row * width + col) * 3;
      data[target] = clampByte(y + 1.402 * v);
      data[target + 1] = clampByte(y - 0.344136 * u - 0.714136 * v);
      data[target + 2] = clampByte(y + 1.772 * u);
    }
  }

  return { width, height, data };
};

/**
 * Converts a YUV 4:2:0 frame into interleaved RGB. A frame without pixel data
 * becomes `emptyImage()` so the live feed keeps running.
 */
export const convertFrame = (frame: RawFrame): PackedImage => {
  if (!frame.planes) return emptyImage();

  const { width, height } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new FrameFormatError(`Invalid frame size ${width}x${height}`);
  }

  return decodeNv21(toNv21(frame), width, height);
};
