import * as tf from '@tensorflow/tfjs';

import type { InputTensor, OutputTensor } from '../types';
import { InferenceError, ModelLoadError } from './errors';
import { assertInputSize, expectedElementCount } from './normalizeImage';

export type InputShape = [batch: number, height: number, width: number, channels: number];

/**
 * Fixed-shape, synchronous inference. `run` is not reentrant and must not be
 * called after `dispose`.
 */
export interface InferencePort {
  inputShape(): InputShape;
  outputShape(): number[];
  outputDType(): tf.DataType;
  run(input: InputTensor): OutputTensor;
  dispose(): void;
}

type LoadedModel = tf.GraphModel | tf.LayersModel;
type DeclaredShape = ReadonlyArray<number | null> | undefined;

const isStatic = (dimension: number | null | undefined): dimension is number =>
  typeof dimension === 'number' && Number.isInteger(dimension) && dimension > 0;

const readInputShape = (shape: DeclaredShape): InputShape => {
  if (!shape || shape.length !== 4) {
    throw new ModelLoadError(`Model input must be NHWC, got [${shape?.join(', ') ?? ''}]`);
  }
  const [batch, height, width, channels] = shape;
  if (isStatic(batch) && batch !== 1) {
    throw new ModelLoadError(`Model input batch must be 1 or dynamic, got ${batch}`);
  }
  if (!isStatic(height) || !isStatic(width) || !isStatic(channels)) {
    throw new ModelLoadError(`Model input must have static H, W and C, got [${shape.join(', ')}]`);
  }
  return [1, height, width, channels];
};

// a dynamic leading (batch) dimension is reported as 1
const readOutputShape = (shape: DeclaredShape): number[] =>
  (shape ?? []).map((dimension, index) =>
    isStatic(dimension) ? dimension : index === 0 ? 1 : -1
  );

const firstTensor = (
  result: tf.Tensor | tf.Tensor[] | tf.NamedTensorMap
): tf.Tensor | undefined => {
  if (result instanceof tf.Tensor) return result;
  if (Array.isArray(result)) return result[0];
  return Object.values(result)[0];
};

export class InferenceEngine implements InferencePort {
  private readonly model: LoadedModel;
  private readonly input: InputShape;
  private readonly output: number[];
  private readonly dtype: tf.DataType;
  private running = false;
  private disposed = false;

  private constructor(model: LoadedModel, input: InputShape, output: number[], dtype: tf.DataType) {
    this.model = model;
    this.input = input;
    this.output = output;
    this.dtype = dtype;
  }

  /**
   * Reads the first input and output descriptors once; they never change for the
   * lifetime of the engine.
   */
  static fromModel(model: LoadedModel): InferenceEngine {
    const [inputInfo] = model.inputs;
    const [outputInfo] = model.outputs;
    if (!inputInfo || !outputInfo) {
      throw new ModelLoadError('Model declares no input or no output tensor');
    }

    return new InferenceEngine(
      model,
      readInputShape(inputInfo.shape),
      readOutputShape(outputInfo.shape),
      outputInfo.dtype ?? 'float32'
    );
  }

  inputShape(): InputShape {
    return [...this.input];
  }

  outputShape(): number[] {
    return [...this.output];
  }

  outputDType(): tf.DataType {
    return this.dtype;
  }

  run(input: InputTensor): OutputTensor {
    if (this.disposed) {
      throw new InferenceError('Inference engine has been disposed');
    }
    if (this.running) {
      throw new InferenceError('Inference engine is not reentrant');
    }
    assertInputSize(input, this.input);

    this.running = true;
    let result: tf.Tensor | undefined;
    try {
      result = tf.tidy(() => {
        const x = tf.tensor4d(input.data, this.input, 'float32');
        const prediction = firstTensor(this.model.predict(x));
        if (!prediction) {
          throw new InferenceError('Model produced no output tensor');
        }
        return prediction;
      });

      const data = result.dataSync();
      if (this.output.every((dimension) => dimension > 0)) {
        const expected = expectedElementCount(this.output);
        if (data.length !== expected) {
          throw new InferenceError(
            `Model produced ${data.length} values, output descriptor declares ${expected}`
          );
        }
      }

      return { data: data.slice(), shape: [...result.shape], dtype: result.dtype };
    } catch (error) {
      if (error instanceof InferenceError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new InferenceError(`Inference failed: ${reason}`, { cause: error });
    } finally {
      result?.dispose();
      this.running = false;
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.model.dispose();
  }

  isDisposed(): boolean {
    return this.disposed;
  }
}
