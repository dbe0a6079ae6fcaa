import type { InputTensor, Normalization, PackedImage, Prediction, RawFrame } from '../types';
import { convertFrame } from './convertFrame';
import { decodePrediction } from './decodePrediction';
import type { PipelineError } from './errors';
import { toPipelineError } from './errors';
import type { InferencePort } from './executeInference';
import { assertInputSize, normalizeImage } from './normalizeImage';
import { resizeImage } from './resizeImage';

/**
 * The per-frame stages. Every stage can be swapped, which is how tests and
 * alternative preprocessing plug in.
 */
export interface InferenceStages {
  convert: (frame: RawFrame) => PackedImage;
  resize: (image: PackedImage, width: number, height: number) => PackedImage;
  normalize: (image: PackedImage, normalization: Normalization) => InputTensor;
}

export const DEFAULT_STAGES: InferenceStages = {
  convert: convertFrame,
  resize: resizeImage,
  normalize: normalizeImage,
};

export interface InferenceContext {
  engine: InferencePort;
  normalization: Normalization;
  labels?: readonly string[];
  stages?: Partial<InferenceStages>;
}

export type DegradedReason = 'capture_unavailable';

export type InferenceOutcome =
  | { ok: true; prediction: Prediction; degraded: DegradedReason | null; latencyMs: number }
  | { ok: false; error: PipelineError; latencyMs: number };

/**
 * Runs one frame through convert, resize, normalize, inference and decode.
 * Never throws: failures come back as `{ ok: false }`.
 */
export const runInference = (frame: RawFrame, context: InferenceContext): InferenceOutcome => {
  const stages = { ...DEFAULT_STAGES, ...context.stages };
  const { engine } = context;
  const start = performance.now();

  try {
    // 1. YUV -> RGB (a frame without pixels becomes the 1x1 placeholder)
    const packed = stages.convert(frame);

    // 2. resize to the model input, whatever the camera aspect ratio
    const [, inputHeight, inputWidth] = engine.inputShape();
    const resized = stages.resize(packed, inputWidth, inputHeight);

    // 3. normalize and check the size before anything reaches the model
    const input = stages.normalize(resized, context.normalization);
    assertInputSize(input, engine.inputShape());

    // 4. inference + decode
    const output = engine.run(input);
    const prediction = decodePrediction(output, context.labels, frame.timestampMs);

    return {
      ok: true,
      prediction,
      degraded: frame.planes === null ? 'capture_unavailable' : null,
      latencyMs: performance.now() - start,
    };
  } catch (error) {
    return { ok: false, error: toPipelineError(error), latencyMs: performance.now() - start };
  }
};
