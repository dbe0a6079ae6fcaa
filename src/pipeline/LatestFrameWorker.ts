import type { FrameHandle } from '../types';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import type { InferenceOutcome } from '../utils/runInference';
import type { FramePipeline } from './FramePipeline';

/**
 * Keep-only-latest delivery in front of a FramePipeline. While a frame is being
 * processed, newer frames replace the pending one; the replaced frame is closed
 * and counted as dropped.
 */
export class LatestFrameWorker {
  private pending: FrameHandle | null = null;
  private draining: Promise<void> | null = null;
  private stopped = false;
  private dropped = 0;
  private readonly pipeline: FramePipeline;
  private readonly onOutcome?: (outcome: InferenceOutcome) => void;
  private readonly logger: Logger;

  constructor(
    pipeline: FramePipeline,
    options: { onOutcome?: (outcome: InferenceOutcome) => void; logger?: Logger } = {}
  ) {
    this.pipeline = pipeline;
    this.onOutcome = options.onOutcome;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Hands a frame over. Returns immediately; the frame is processed when the
   * pipeline is free, unless a newer frame arrives first.
   */
  offer(handle: FrameHandle): void {
    if (this.stopped) {
      handle.close();
      return;
    }

    if (this.pending) {
      this.pending.close();
      this.dropped++;
      this.logger.debug(`Dropped frame, ${this.dropped} so far`);
    }
    this.pending = handle;

    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  droppedFrames(): number {
    return this.dropped;
  }

  hasPending(): boolean {
    return this.pending !== null;
  }

  /** Resolves once the frame in flight (if any) has finished. */
  idle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  /**
   * Stops delivery: the pending frame is closed without processing and the
   * frame in flight is awaited.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.pending) {
      this.pending.close();
      this.pending = null;
    }
    await this.idle();
  }

  // always awaits at least once, so the finally below runs after `draining` is set
  private async drain(): Promise<void> {
    try {
      while (this.pending && !this.stopped) {
        const handle = this.pending;
        this.pending = null;
        const outcome = await this.pipeline.process(handle);
        this.onOutcome?.(outcome);
      }
    } catch (error) {
      this.logger.error('Frame delivery stopped', error);
    } finally {
      this.draining = null;
    }
  }
}
