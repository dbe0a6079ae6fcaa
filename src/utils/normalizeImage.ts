import * as tf from '@tensorflow/tfjs';

import type { InputTensor, Normalization, PackedImage } from '../types';
import { ConfigurationError, ShapeMismatchError } from './errors';

export const expectedElementCount = (shape: readonly number[]): number =>
  shape.reduce((count, dimension) => count * dimension, 1);

/**
 * Maps every byte to `(value - mean) / scale` as float32, keeping the RGB order
 * and adding the batch dimension.
 */
export const normalizeImage = (image: PackedImage, { mean, scale }: Normalization): InputTensor => {
  if (scale === 0 || !Number.isFinite(scale) || !Number.isFinite(mean)) {
    throw new ConfigurationError(`Invalid normalization mean=${mean} scale=${scale}`);
  }

  const normalized = tf.tidy(() =>
    tf.tensor1d(image.data, 'float32').sub(mean).div(scale)
  );

  try {
    return {
      data: Float32Array.from(normalized.dataSync()),
      shape: [1, image.height, image.width, 3],
    };
  } finally {
    normalized.dispose();
  }
};

/**
 * The tensor must hold exactly as many elements as the model input; nothing is
 * padded or truncated.
 */
export const assertInputSize = (tensor: InputTensor, expectedShape: readonly number[]): void => {
  const expected = expectedElementCount(expectedShape);
  if (tensor.data.length !== expected) {
    throw new ShapeMismatchError(expected, tensor.data.length);
  }
};
