import React from 'react';

import { usePrediction } from '../hooks/usePrediction';
import type { PredictionChannel } from '../pipeline/predictionChannel';

interface PredictionViewProps {
  channel: PredictionChannel;
}

const PredictionView: React.FC<PredictionViewProps> = ({ channel }) => {
  const prediction = usePrediction(channel);

  if (!prediction) {
    return (
      <p data-testid="prediction-waiting" className="text-center text-gray-400">
        Waiting for the first frame...
      </p>
    );
  }

  if (prediction.labelIndex === -1) {
    return (
      <p data-testid="prediction-none" className="text-center text-yellow-400">
        No prediction
      </p>
    );
  }

  const name = prediction.label ?? `ID: ${prediction.labelIndex}`;
  const confidence = prediction.confidence ?? 0;

  return (
    <div data-testid="prediction" className="flex justify-between items-center bg-gray-800 p-4 rounded-lg">
      <span data-testid="prediction-label" className="text-gray-300">
        {name}
      </span>
      <span data-testid="prediction-confidence" className="text-teal-400">
        {`${(confidence * 100).toFixed(1)}%`}
      </span>
    </div>
  );
};

export default PredictionView;
