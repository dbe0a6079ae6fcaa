import * as tf from '@tensorflow/tfjs';

import type { FrameHandle, OutputTensor, RawFrame } from '../types';
import type { InferencePort, InputShape } from '../utils/executeInference';
import type { ModelArtifact } from '../utils/loadModel';

export interface YuvColor {
  y: number;
  u: number;
  v: number;
}

/** Y=81 U=90 V=240 decodes to RGB (238, 14, 14). */
export const RED: YuvColor = { y: 81, u: 90, v: 240 };
export const GRAY: YuvColor = { y: 128, u: 128, v: 128 };

/**
 * Single-colour 4:2:0 frame. `semiPlanar` mimics a camera that exposes one
 * interleaved VU buffer through two views with pixelStride 2.
 */
export const uniformFrame = (
  width: number,
  height: number,
  color: YuvColor,
  layout: 'planar' | 'semiPlanar' = 'planar'
): RawFrame => {
  const chromaWidth = Math.ceil(width / 2);
  const chromaHeight = Math.ceil(height / 2);
  const luma = { bytes: new Uint8Array(width * height).fill(color.y), rowStride: width, pixelStride: 1 };

  if (layout === 'planar') {
    return {
      width,
      height,
      planes: [
        luma,
        { bytes: new Uint8Array(chromaWidth * chromaHeight).fill(color.u), rowStride: chromaWidth, pixelStride: 1 },
        { bytes: new Uint8Array(chromaWidth * chromaHeight).fill(color.v), rowStride: chromaWidth, pixelStride: 1 },
      ],
    };
  }

  const vu = new Uint8Array(2 * chromaWidth * chromaHeight);
  for (let i = 0; i < vu.length; i += 2) {
    vu[i] = color.v;
    vu[i + 1] = color.u;
  }
  return {
    width,
    height,
    planes: [
      luma,
      { bytes: vu.subarray(1), rowStride: 2 * chromaWidth, pixelStride: 2 },
      { bytes: vu.subarray(0, vu.length - 1), rowStride: 2 * chromaWidth, pixelStride: 2 },
    ],
  };
};

export const blankFrame = (width: number, height: number): RawFrame => ({ width, height, planes: null });

export interface TrackedHandle extends FrameHandle {
  closeCount(): number;
}

export const trackedHandle = (frame: RawFrame, onClose?: () => void): TrackedHandle => {
  let closes = 0;
  return {
    frame,
    close: () => {
      closes++;
      onClose?.();
    },
    closeCount: () => closes,
  };
};

/**
 * Global average pooling followed by an identity dense layer: the three scores
 * are the mean R, G and B of the input.
 */
export const buildChannelMeanModel = (width: number, height: number): tf.LayersModel => {
  const model = tf.sequential({
    layers: [
      tf.layers.globalAveragePooling2d({ inputShape: [height, width, 3] }),
      tf.layers.dense({ units: 3, useBias: false }),
    ],
  });
  const identity = tf.eye(3);
  model.layers[1].setWeights([identity]);
  identity.dispose();
  return model;
};

const joinBuffers = (data: tf.io.ModelArtifacts['weightData']): Uint8Array => {
  if (!data) return new Uint8Array(0);
  const buffers = Array.isArray(data) ? data : [data];
  const joined = new Uint8Array(buffers.reduce((total, buffer) => total + buffer.byteLength, 0));
  let offset = 0;
  for (const buffer of buffers) {
    joined.set(new Uint8Array(buffer), offset);
    offset += buffer.byteLength;
  }
  return joined;
};

/** Serializes a model the way it would be stored next to its weights.bin. */
export const serializeModel = async (model: tf.LayersModel): Promise<ModelArtifact> => {
  const captured: { artifacts?: tf.io.ModelArtifacts } = {};
  await model.save(
    tf.io.withSaveHandler(async (artifacts) => {
      captured.artifacts = artifacts;
      return { modelArtifactsInfo: tf.io.getModelArtifactsInfoForJSON(artifacts) };
    })
  );

  const { artifacts } = captured;
  if (!artifacts) {
    throw new Error('Model was not serialized');
  }

  const modelJson = {
    format: artifacts.format,
    generatedBy: artifacts.generatedBy,
    convertedBy: artifacts.convertedBy,
    modelTopology: artifacts.modelTopology,
    weightsManifest: [{ paths: ['weights.bin'], weights: artifacts.weightSpecs ?? [] }],
  };

  return {
    modelJson: new TextEncoder().encode(JSON.stringify(modelJson)),
    weightData: joinBuffers(artifacts.weightData),
  };
};

export const encodeJson = (value: unknown): Uint8Array => new TextEncoder().encode(JSON.stringify(value));

/** In-process engine returning fixed scores; records what happens to it. */
export const fakeEngine = (
  scores: number[] = [0.1, 0.7, 0.2],
  events: string[] = [],
  shape: InputShape = [1, 4, 4, 3]
): InferencePort => ({
  inputShape: () => [...shape],
  outputShape: () => [1, scores.length],
  outputDType: () => 'float32',
  run: (): OutputTensor => {
    events.push('run');
    return { data: Float32Array.from(scores), shape: [1, scores.length], dtype: 'float32' };
  },
  dispose: () => {
    events.push('dispose');
  },
});
