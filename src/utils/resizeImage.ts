import * as tf from '@tensorflow/tfjs';

import type { PackedImage } from '../types';
import { ConfigurationError } from './errors';

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

/**
 * Bilinear resize to exactly targetWidth x targetHeight. The aspect ratio is not
 * preserved.
 */
export const resizeImage = (
  image: PackedImage,
  targetWidth: number,
  targetHeight: number
): PackedImage => {
  if (!isPositiveInteger(targetWidth) || !isPositiveInteger(targetHeight)) {
    throw new ConfigurationError(`Invalid resize target ${targetWidth}x${targetHeight}`);
  }

  if (image.width === targetWidth && image.height === targetHeight) {
    return { width: targetWidth, height: targetHeight, data: image.data.slice() };
  }

  const resized = tf.tidy(() => {
    const pixels = tf.tensor3d(image.data, [image.height, image.width, 3], 'int32');
    // halfPixelCenters matches how bitmap scalers sample
    return tf.image
      .resizeBilinear(pixels, [targetHeight, targetWidth], false, true)
      .round()
      .clipByValue(0, 255)
      .cast('int32');
  });

  try {
    return {
      width: targetWidth,
      height: targetHeight,
      data: Uint8Array.from(resized.dataSync()),
    };
  } finally {
    resized.dispose();
  }
};
