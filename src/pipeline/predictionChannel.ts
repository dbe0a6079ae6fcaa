import type { Prediction, PredictionSink } from '../types';

type Listener = (prediction: Prediction) => void;

/**
 * Latest-value channel from the pipeline to presentation. Only the pipeline
 * publishes; readers see the most recent prediction and nothing older.
 */
export class PredictionChannel implements PredictionSink {
  private latest: Prediction | null = null;
  private readonly listeners = new Set<Listener>();

  publish(prediction: Prediction): void {
    this.latest = prediction;
    for (const listener of this.listeners) {
      listener(prediction);
    }
  }

  getLatest = (): Prediction | null => this.latest;

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };
}
