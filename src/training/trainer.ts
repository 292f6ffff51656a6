import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { SentinelError } from '../errors.js';
import type {
  ModelFormat,
  PreprocessingParams,
  TrainingHyperparameters,
  TrainingProgress,
  TrainingStats
} from '../types.js';
import { createSeededRandom, shuffleInPlace } from '../utils/random.js';
import { mean, percentile } from '../utils/stats.js';
import { decodePng } from '../video/utils.js';
import {
  LINEAR_AUTOENCODER_FORMAT,
  LinearAutoencoder,
  reconstructionError,
  type AutoencoderOptions,
  type TrainableModel
} from './autoencoder.js';
import {
  buildPreprocessing,
  computeChannelStats,
  normalizeVector,
  scaleFrame,
  type InputShape
} from './preprocess.js';

const MIN_TRAINING_IMAGES = 2;
const MIN_VALIDATION_IMAGES = 1;
const MIN_THRESHOLD = 1e-9;
const IMPROVEMENT_EPSILON = 1e-12;

export type TrainingSample = {
  key: string;
  content: Uint8Array;
};

export type EpochRecord = {
  epoch: number;
  loss: number;
  validationError: number;
};

export type TrainOptions = {
  hyperparameters: TrainingHyperparameters;
  signal?: AbortSignal;
  onProgress?: (progress: TrainingProgress) => void;
  createModel?: (options: AutoencoderOptions) => TrainableModel;
};

export type TrainingOutcome = {
  artifact: Buffer;
  format: ModelFormat;
  preprocessing: PreprocessingParams;
  threshold: number;
  validationError: number;
  trainingErrors: number[];
  validationErrors: number[];
  history: EpochRecord[];
  holdoutKeys: string[];
  stats: TrainingStats;
};

export async function train(samples: TrainingSample[], options: TrainOptions): Promise<TrainingOutcome> {
  const hp = options.hyperparameters;
  const shape: InputShape = { width: hp.inputWidth, height: hp.inputHeight, channels: hp.channels };
  if (samples.length < MIN_TRAINING_IMAGES + MIN_VALIDATION_IMAGES) {
    throw new SentinelError(
      'InsufficientData',
      `Need at least ${MIN_TRAINING_IMAGES + MIN_VALIDATION_IMAGES} normal images, received ${samples.length}`
    );
  }
  throwIfAborted(options.signal);

  const scaled = samples.map(sample => ({ key: sample.key, vector: decodeSample(sample, shape) }));
  const overall = computeChannelStats(
    scaled.map(entry => entry.vector),
    shape
  );
  if (overall.std.every(value => value <= 0)) {
    throw new SentinelError('InsufficientData', 'Images have no variance');
  }

  const random = createSeededRandom(hp.seed);
  const order = shuffleInPlace(
    scaled.map((_, index) => index),
    random
  );
  const holdoutCount = Math.min(
    samples.length - MIN_TRAINING_IMAGES,
    Math.max(MIN_VALIDATION_IMAGES, Math.round(samples.length * hp.holdoutFraction))
  );
  const validationSet = order.slice(0, holdoutCount).map(index => scaled[index]);
  const trainingSet = order.slice(holdoutCount).map(index => scaled[index]);

  const preprocessing = buildPreprocessing(
    shape,
    computeChannelStats(
      trainingSet.map(entry => entry.vector),
      shape
    )
  );
  const trainingInputs = trainingSet.map(entry => normalizeVector(entry.vector, preprocessing));
  const validationInputs = validationSet.map(entry => normalizeVector(entry.vector, preprocessing));

  const createModel = options.createModel ?? (modelOptions => new LinearAutoencoder(modelOptions));
  const model = createModel({
    inputSize: trainingInputs[0].length,
    latentDim: hp.latentDim,
    learningRate: hp.learningRate,
    seed: hp.seed
  });

  const history: EpochRecord[] = [];
  let best = model.snapshot();
  let bestValidationError = Number.POSITIVE_INFINITY;
  let epochsWithoutImprovement = 0;
  const batchSize = Math.max(1, Math.floor(hp.batchSize));

  for (let epoch = 1; epoch <= hp.maxEpochs; epoch += 1) {
    const epochOrder = shuffleInPlace(
      trainingInputs.map((_, index) => index),
      random
    );
    let lossSum = 0;
    let batches = 0;
    for (let start = 0; start < epochOrder.length; start += batchSize) {
      const batch = epochOrder.slice(start, start + batchSize).map(index => trainingInputs[index]);
      lossSum += model.trainBatch(batch);
      batches += 1;
    }
    const loss = lossSum / Math.max(1, batches);
    const validationError = mean(validationInputs.map(input => reconstructionError(model, input)));
    if (!Number.isFinite(loss) || !Number.isFinite(validationError)) {
      throw new SentinelError('TrainingDiverged', `Loss became non-finite at epoch ${epoch}`);
    }

    history.push({ epoch, loss, validationError });
    if (validationError < bestValidationError - IMPROVEMENT_EPSILON) {
      bestValidationError = validationError;
      best = model.snapshot();
      epochsWithoutImprovement = 0;
    } else {
      epochsWithoutImprovement += 1;
    }

    options.onProgress?.({ epoch, loss, validationError, bestValidationError });

    await yieldToEventLoop();
    throwIfAborted(options.signal);

    if (epochsWithoutImprovement >= hp.patience) {
      break;
    }
  }

  model.restore(best);
  const trainingErrors = trainingInputs.map(input => reconstructionError(model, input));
  const validationErrors = validationInputs.map(input => reconstructionError(model, input));
  const maxObservedError = Math.max(...trainingErrors, ...validationErrors);
  if (!Number.isFinite(maxObservedError)) {
    throw new SentinelError('TrainingDiverged', 'Reconstruction error is non-finite');
  }
  if (Math.max(...trainingErrors) <= 0) {
    throw new SentinelError('InsufficientData', 'Images are reconstructed without error');
  }

  const threshold = recommendThreshold(validationErrors, trainingErrors, hp.thresholdPercentile);

  return {
    artifact: model.serialize(),
    format: LINEAR_AUTOENCODER_FORMAT,
    preprocessing,
    threshold,
    validationError: mean(validationErrors),
    trainingErrors,
    validationErrors,
    history,
    holdoutKeys: validationSet.map(entry => entry.key),
    stats: {
      epochs: history.length,
      trainingSize: trainingSet.length,
      validationSize: validationSet.length,
      meanTrainingError: mean(trainingErrors),
      maxObservedError
    }
  };
}

/**
 * Percentile of validation errors, kept strictly inside (0, max training error).
 */
export function recommendThreshold(validationErrors: number[], trainingErrors: number[], p: number): number {
  const maxObserved = Math.max(...trainingErrors);
  let threshold = percentile(validationErrors, p);
  if (!(threshold < maxObserved)) {
    const below = trainingErrors.filter(value => value < maxObserved);
    const nextHighest = below.length > 0 ? Math.max(...below) : 0;
    threshold = (nextHighest + maxObserved) / 2;
  }
  if (threshold <= 0) {
    threshold = Math.min(MIN_THRESHOLD, maxObserved / 2);
  }
  return threshold;
}

function decodeSample(sample: TrainingSample, shape: InputShape): Float32Array {
  try {
    return scaleFrame(decodePng(Buffer.from(sample.content)), shape);
  } catch (error) {
    throw new SentinelError('InsufficientData', `Snapshot ${sample.key} could not be decoded`, { cause: error });
  }
}

function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) {
    throw new SentinelError('Cancelled', 'Training cancelled');
  }
}
