import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import * as tf from '@tensorflow/tfjs';
import { z } from 'zod';

import { ModelLoadError } from './errors';
import { InferenceEngine } from './executeInference';
import type { Logger } from './logger';
import { silentLogger } from './logger';

/**
 * A TensorFlow.js model as stored on disk: the bytes of model.json and all of its
 * weight shards concatenated in manifest order.
 */
export interface ModelArtifact {
  modelJson: Uint8Array;
  weightData: Uint8Array;
}

const weightSpecSchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  dtype: z.enum(['float32', 'int32', 'bool', 'string', 'complex64']),
  quantization: z
    .object({
      scale: z.number().optional(),
      min: z.number().optional(),
      dtype: z.enum(['uint16', 'uint8', 'float16']),
    })
    .optional(),
});

// metadata values are opaque to the loader but never null
const metadataValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.unknown()),
  z.record(z.unknown()),
]);

const modelJsonSchema = z.object({
  modelTopology: z.record(z.unknown()),
  format: z.string().optional(),
  generatedBy: z.string().optional(),
  convertedBy: z.string().nullable().optional(),
  // graph models resolve their inputs, outputs and hash-table initializers from these
  signature: z.record(z.unknown()).optional(),
  modelInitializer: z.record(z.unknown()).optional(),
  initializerSignature: z.record(z.unknown()).optional(),
  userDefinedMetadata: z.record(metadataValueSchema).optional(),
  weightsManifest: z
    .array(
      z.object({
        paths: z.array(z.string()),
        weights: z.array(weightSpecSchema),
      })
    )
    .default([]),
});

type ModelJson = z.infer<typeof modelJsonSchema>;

const BYTES_PER_ELEMENT: Record<string, number> = {
  float32: 4,
  int32: 4,
  bool: 1,
  complex64: 8,
  uint8: 1,
  uint16: 2,
  float16: 2,
};

const decodeModelJson = (bytes: Uint8Array): ModelJson => {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder().decode(bytes));
  } catch (error) {
    throw new ModelLoadError('model.json is not valid JSON', { cause: error });
  }

  const result = modelJsonSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ModelLoadError(`model.json is not a TensorFlow.js model: ${issues.join('; ')}`);
  }
  return result.data;
};

const expectedWeightBytes = (specs: ModelJson['weightsManifest'][number]['weights']): number =>
  specs.reduce((total, spec) => {
    if (spec.dtype === 'string') {
      throw new ModelLoadError(`String weight ${spec.name} is not supported`);
    }
    const elements = spec.shape.reduce((count, dimension) => count * dimension, 1);
    const dtype = spec.quantization?.dtype ?? spec.dtype;
    return total + elements * BYTES_PER_ELEMENT[dtype];
  }, 0);

/**
 * Validates the artifact and turns it into the in-memory form tf.io understands.
 */
export const parseModelArtifact = (artifact: ModelArtifact): tf.io.ModelArtifacts => {
  const modelJson = decodeModelJson(artifact.modelJson);
  const weightSpecs = modelJson.weightsManifest.flatMap((group) => group.weights);

  const expected = expectedWeightBytes(weightSpecs);
  if (artifact.weightData.byteLength !== expected) {
    throw new ModelLoadError(
      `Weight data holds ${artifact.weightData.byteLength} bytes, manifest describes ${expected}`
    );
  }

  // copy so the model never shares memory with the caller's buffer
  const weightData = new ArrayBuffer(expected);
  new Uint8Array(weightData).set(artifact.weightData);

  return {
    modelTopology: modelJson.modelTopology,
    format: modelJson.format,
    generatedBy: modelJson.generatedBy,
    convertedBy: modelJson.convertedBy ?? undefined,
    signature: modelJson.signature,
    modelInitializer: modelJson.modelInitializer,
    initializerSignature: modelJson.initializerSignature,
    userDefinedMetadata: modelJson.userDefinedMetadata,
    weightSpecs,
    weightData,
  };
};

/**
 * Reads model.json and the weight shards it lists from the same directory.
 */
export const readModelArtifact = async (modelPath: string): Promise<ModelArtifact> => {
  let modelJson: Uint8Array;
  try {
    modelJson = new Uint8Array(await readFile(modelPath));
  } catch (error) {
    throw new ModelLoadError(`Cannot read model file ${modelPath}`, { cause: error });
  }

  const { weightsManifest } = decodeModelJson(modelJson);
  const shardPaths = weightsManifest.flatMap((group) => group.paths);
  const directory = dirname(modelPath);

  const shards: Uint8Array[] = [];
  for (const shardPath of shardPaths) {
    try {
      shards.push(new Uint8Array(await readFile(join(directory, shardPath))));
    } catch (error) {
      throw new ModelLoadError(`Cannot read weight shard ${shardPath}`, { cause: error });
    }
  }

  const weightData = new Uint8Array(shards.reduce((total, shard) => total + shard.length, 0));
  let offset = 0;
  for (const shard of shards) {
    weightData.set(shard, offset);
    offset += shard.length;
  }

  return { modelJson, weightData };
};

/**
 * Loads the model (graph or layers format) and queries its tensor shapes once.
 */
export const loadInferenceEngine = async (
  artifact: ModelArtifact,
  logger: Logger = silentLogger
): Promise<InferenceEngine> => {
  const artifacts = parseModelArtifact(artifact);

  logger.info('Loading model...');
  await tf.ready();

  let model: tf.GraphModel | tf.LayersModel;
  try {
    model =
      artifacts.format === 'graph-model'
        ? await tf.loadGraphModel(tf.io.fromMemory(artifacts))
        : await tf.loadLayersModel(tf.io.fromMemory(artifacts));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ModelLoadError(`Model could not be built: ${reason}`, { cause: error });
  }

  try {
    const engine = InferenceEngine.fromModel(model);
    logger.info(
      `Model loaded on ${tf.getBackend()}: input [${engine.inputShape().join(', ')}], output [${engine
        .outputShape()
        .join(', ')}] ${engine.outputDType()}`
    );
    return engine;
  } catch (error) {
    model.dispose();
    throw error;
  }
};
