/**
 * transient: this frame produced no prediction, the next one may.
 * structural: the model or configuration is wrong; every frame will fail the same way.
 */
export type ErrorSeverity = 'transient' | 'structural';

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FrameFormatError extends PipelineError {
  readonly code = 'FRAME_FORMAT';
  readonly severity = 'transient';
}

export class ShapeMismatchError extends PipelineError {
  readonly code = 'SHAPE_MISMATCH';
  readonly severity = 'transient';
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Input tensor has ${actual} elements, model expects ${expected}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class InferenceError extends PipelineError {
  readonly code = 'INFERENCE_FAILED';
  readonly severity = 'transient';
}

export class PipelineBusyError extends PipelineError {
  readonly code = 'PIPELINE_BUSY';
  readonly severity = 'transient';

  constructor() {
    super('A frame is already being processed');
  }
}

export class PipelineClosedError extends PipelineError {
  readonly code = 'PIPELINE_CLOSED';
  readonly severity = 'transient';

  constructor() {
    super('Pipeline is closed');
  }
}

export class ModelLoadError extends PipelineError {
  readonly code = 'MODEL_LOAD_FAILED';
  readonly severity = 'structural';
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION';
  readonly severity = 'structural';
}

export const isStructural = (error: unknown): boolean =>
  error instanceof PipelineError && error.severity === 'structural';

/** Wraps anything thrown by a stage so callers only ever see PipelineErrors. */
export const toPipelineError = (error: unknown): PipelineError => {
  if (error instanceof PipelineError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InferenceError(message, { cause: error });
};
