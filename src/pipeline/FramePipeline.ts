import { setImmediate as nextTurn } from 'node:timers/promises';

import { DEFAULT_NORMALIZATION } from '../config';
import type { FrameHandle, Normalization, PredictionSink } from '../types';
import { noPrediction } from '../utils/decodePrediction';
import type { PipelineError } from '../utils/errors';
import {
  ConfigurationError,
  PipelineBusyError,
  PipelineClosedError,
  ShapeMismatchError,
} from '../utils/errors';
import type { InferencePort } from '../utils/executeInference';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import type { InferenceOutcome, InferenceStages } from '../utils/runInference';
import { runInference } from '../utils/runInference';

export type PipelineState = 'idle' | 'processing' | 'closed';

export interface FramePipelineOptions {
  sink: PredictionSink;
  normalization?: Normalization;
  labels?: readonly string[];
  stages?: Partial<InferenceStages>;
  structuralMismatchThreshold?: number;
  onError?: (error: PipelineError) => void;
  logger?: Logger;
}

const once = (fn: () => void): (() => void) => {
  let called = false;
  return () => {
    if (called) return;
    called = true;
    fn();
  };
};

const rejected = (error: PipelineError): InferenceOutcome => ({ ok: false, error, latencyMs: 0 });

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Single-flight frame pipeline: idle -> processing -> idle, closed on shutdown.
 * It never queues; keeping only the latest frame is the frame source's job
 * (see LatestFrameWorker).
 */
export class FramePipeline {
  private state: PipelineState = 'idle';
  private closing: Promise<void> | null = null;
  private inFlight: Promise<InferenceOutcome> | null = null;
  private consecutiveMismatches = 0;
  private readonly normalization: Normalization;
  private readonly threshold: number;
  private readonly logger: Logger;

  private constructor(
    private readonly engine: InferencePort,
    private readonly options: FramePipelineOptions
  ) {
    this.normalization = options.normalization ?? DEFAULT_NORMALIZATION;
    this.threshold = options.structuralMismatchThreshold ?? 3;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validates the model against what the pipeline produces (RGB, batch 1) before
   * any frame is accepted.
   */
  static create(engine: InferencePort, options: FramePipelineOptions): FramePipeline {
    const [batch, height, width, channels] = engine.inputShape();
    if (channels !== 3) {
      throw new ConfigurationError(`Model expects ${channels} channels, frames are converted to RGB`);
    }
    if (batch !== 1) {
      throw new ConfigurationError(`Model expects batch ${batch}, frames are processed one at a time`);
    }

    const outputs = engine.outputShape();
    const labelCount = options.labels?.length ?? 0;
    const scoreCount = outputs.every((dimension) => dimension > 0)
      ? outputs.reduce((count, dimension) => count * dimension, 1)
      : null;
    if (labelCount > 0 && scoreCount !== null && labelCount !== scoreCount) {
      options.logger?.warn(`${labelCount} labels for ${scoreCount} output scores`);
    }

    options.logger?.info(`Pipeline ready for ${width}x${height} input`);
    return new FramePipeline(engine, options);
  }

  getState(): PipelineState {
    return this.state;
  }

  /**
   * Processes one frame on a later turn of the event loop and publishes the
   * result. The handle is closed exactly once, whatever happens.
   */
  process(handle: FrameHandle): Promise<InferenceOutcome> {
    const release = once(() => handle.close());

    if (this.state === 'closed' || this.closing) {
      this.guard('Closing frame', release);
      return Promise.resolve(rejected(new PipelineClosedError()));
    }
    if (this.state === 'processing') {
      this.guard('Closing frame', release);
      return Promise.resolve(rejected(new PipelineBusyError()));
    }

    this.state = 'processing';
    const run = async (): Promise<InferenceOutcome> => {
      try {
        await nextTurn();
        return this.handleOutcome(
          handle.frame.timestampMs,
          runInference(handle.frame, {
            engine: this.engine,
            normalization: this.normalization,
            labels: this.options.labels,
            stages: this.options.stages,
          })
        );
      } finally {
        this.state = 'idle';
        this.inFlight = null;
        this.guard('Closing frame', release);
      }
    };

    this.inFlight = run();
    return this.inFlight;
  }

  /**
   * Stops accepting frames, waits for the frame in flight, then releases the
   * engine. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = (async () => {
        await this.inFlight?.catch((error: unknown) =>
          this.logger.error(`Frame in flight failed during close: ${describe(error)}`)
        );
        try {
          this.engine.dispose();
        } finally {
          this.state = 'closed';
          this.logger.info('Pipeline closed');
        }
      })();
    }
    return this.closing;
  }

  private handleOutcome(timestampMs: number | undefined, outcome: InferenceOutcome): InferenceOutcome {
    if (outcome.ok) {
      this.consecutiveMismatches = 0;
      if (outcome.degraded) {
        this.logger.warn(`Frame degraded (${outcome.degraded}), publishing placeholder result`);
      }
      this.logger.debug(
        `Prediction ${outcome.prediction.labelIndex} in ${outcome.latencyMs.toFixed(1)} ms`
      );
      this.guard('Prediction sink', () => this.options.sink.publish(outcome.prediction));
      return outcome;
    }

    const error = this.classify(outcome.error);
    if (error.severity === 'structural') {
      this.logger.error(`${error.code}: ${error.message}`);
    } else {
      this.logger.warn(`Frame skipped (${error.code}): ${error.message}`);
    }
    this.guard('Prediction sink', () => this.options.sink.publish(noPrediction(timestampMs)));
    this.guard('Error listener', () => this.options.onError?.(error));
    return { ...outcome, error };
  }

  // listeners and frame owners run outside the pipeline's control; a throw is logged
  private guard(what: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.error(`${what} threw: ${describe(error)}`);
    }
  }

  // repeated shape mismatches mean the model and the pipeline disagree
  private classify(error: PipelineError): PipelineError {
    if (!(error instanceof ShapeMismatchError)) {
      this.consecutiveMismatches = 0;
      return error;
    }

    this.consecutiveMismatches++;
    if (this.consecutiveMismatches < this.threshold) return error;

    return new ConfigurationError(
      `${this.consecutiveMismatches} consecutive frames did not match the model input: ${error.message}`,
      { cause: error }
    );
  }
}
