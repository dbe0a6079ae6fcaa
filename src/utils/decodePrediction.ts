import type { OutputTensor, Prediction } from '../types';

/**
 * Index of the largest score; the first one wins a tie. -1 for an empty sequence.
 */
export const argmax = (scores: ArrayLike<number>): number => {
  let maxIndex = -1;
  let maxScore = -Infinity;
  for (let i = 0; i < scores.length; i++) {
    // strict comparison keeps the first maximum and never picks NaN
    if (scores[i] > maxScore || (maxIndex === -1 && scores[i] === -Infinity)) {
      maxScore = scores[i];
      maxIndex = i;
    }
  }
  return maxIndex;
};

export const noPrediction = (timestampMs?: number): Prediction => ({
  labelIndex: -1,
  rawScores: [],
  confidence: null,
  label: null,
  ...(timestampMs === undefined ? {} : { timestampMs }),
});

/**
 * Flattens the model output into one score vector and picks its argmax.
 */
export const decodePrediction = (
  output: Pick<OutputTensor, 'data'>,
  labels: readonly string[] = [],
  timestampMs?: number
): Prediction => {
  const rawScores = Array.from(output.data);
  const labelIndex = argmax(rawScores);

  return {
    labelIndex,
    rawScores,
    confidence: labelIndex === -1 ? null : rawScores[labelIndex],
    label: labelIndex === -1 ? null : labels[labelIndex] ?? null,
    ...(timestampMs === undefined ? {} : { timestampMs }),
  };
};
