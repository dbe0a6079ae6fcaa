import type { PipelineConfigInput } from './config';
import { parseConfig, readLabels } from './config';
import { FramePipeline } from './pipeline/FramePipeline';
import { LatestFrameWorker } from './pipeline/LatestFrameWorker';
import { PredictionChannel } from './pipeline/predictionChannel';
import type { PipelineError } from './utils/errors';
import { loadInferenceEngine, readModelArtifact } from './utils/loadModel';
import type { Logger } from './utils/logger';
import { createLogger } from './utils/logger';
import type { InferenceOutcome } from './utils/runInference';

export interface Classifier {
  pipeline: FramePipeline;
  worker: LatestFrameWorker;
  channel: PredictionChannel;
  /** Stops frame delivery, waits for the frame in flight and releases the model. */
  close(): Promise<void>;
}

export interface ClassifierHooks {
  onError?: (error: PipelineError) => void;
  onOutcome?: (outcome: InferenceOutcome) => void;
  logger?: Logger;
}

/**
 * Loads the model and labels named by the configuration and wires
 * worker -> pipeline -> channel. Model and configuration failures are thrown.
 */
export const createClassifier = async (
  input: PipelineConfigInput,
  hooks: ClassifierHooks = {}
): Promise<Classifier> => {
  const config = parseConfig(input);
  const logger = hooks.logger ?? createLogger('frame-classifier', config.logLevel);

  const artifact = await readModelArtifact(config.modelPath);
  const engine = await loadInferenceEngine(artifact, logger);

  let pipeline: FramePipeline;
  const channel = new PredictionChannel();
  try {
    const labels = config.labelsPath ? await readLabels(config.labelsPath) : undefined;
    pipeline = FramePipeline.create(engine, {
      sink: channel,
      normalization: config.normalization,
      labels,
      structuralMismatchThreshold: config.structuralMismatchThreshold,
      onError: hooks.onError,
      logger,
    });
  } catch (error) {
    engine.dispose();
    throw error;
  }

  const worker = new LatestFrameWorker(pipeline, { onOutcome: hooks.onOutcome, logger });

  return {
    pipeline,
    worker,
    channel,
    close: async () => {
      await worker.stop();
      await pipeline.close();
    },
  };
};
