import type { DataType, TypedArray } from '@tensorflow/tfjs';

/** One byte plane of a camera frame. */
export interface PlaneData {
  bytes: Uint8Array;
  /** Bytes between the starts of two consecutive rows. */
  rowStride: number;
  /** Bytes between two consecutive samples in a row (1 = planar, 2 = semi-planar view). */
  pixelStride: number;
}

/**
 * YUV 4:2:0 camera frame. `planes` is null when the camera delivered a frame
 * without pixel data.
 */
export interface RawFrame {
  width: number;
  height: number;
  planes: readonly [luma: PlaneData, chromaU: PlaneData, chromaV: PlaneData] | null;
  timestampMs?: number;
}

/** Owning handle for a frame; the pipeline closes it once it is done with the frame. */
export interface FrameHandle {
  readonly frame: RawFrame;
  close(): void;
}

/** Interleaved RGB, 3 bytes per pixel, row-major. */
export interface PackedImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface InputTensor {
  data: Float32Array;
  shape: [1, number, number, 3];
}

export interface OutputTensor {
  data: TypedArray;
  shape: number[];
  dtype: DataType;
}

export interface Prediction {
  /** argmax of rawScores, -1 when there is nothing to choose from */
  labelIndex: number;
  rawScores: number[];
  confidence: number | null;
  label: string | null;
  timestampMs?: number;
}

export interface Normalization {
  mean: number;
  scale: number;
}

export interface PredictionSink {
  publish(prediction: Prediction): void;
}
