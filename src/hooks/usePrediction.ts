import { useSyncExternalStore } from 'react';

import type { PredictionChannel } from '../pipeline/predictionChannel';
import type { Prediction } from '../types';

/**
 * Latest prediction published on the channel; re-renders on every publish.
 */
export const usePrediction = (channel: PredictionChannel): Prediction | null =>
  useSyncExternalStore(channel.subscribe, channel.getLatest, channel.getLatest);
