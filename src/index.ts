export * from './types';
export * from './config';
export * from './createClassifier';
export * from './utils/convertFrame';
export * from './utils/resizeImage';
export * from './utils/normalizeImage';
export * from './utils/executeInference';
export * from './utils/loadModel';
export * from './utils/decodePrediction';
export * from './utils/runInference';
export * from './utils/errors';
export * from './utils/logger';
export * from './pipeline/FramePipeline';
export * from './pipeline/LatestFrameWorker';
export * from './pipeline/predictionChannel';
export * from './hooks/usePrediction';
export { default as PredictionView } from './components/PredictionView';
