import type { PreprocessingParams } from '../types.js';
import { frameToPlanar, type Frame } from '../video/utils.js';

const MIN_STD = 1e-6;

export type InputShape = {
  width: number;
  height: number;
  channels: 1 | 3;
};

export type ChannelStats = {
  mean: number[];
  std: number[];
};

export function inputSize(shape: InputShape) {
  return shape.width * shape.height * shape.channels;
}

export function scaleFrame(frame: Frame, shape: InputShape): Float32Array {
  return frameToPlanar(frame, shape.width, shape.height, shape.channels);
}

export function computeChannelStats(vectors: Float32Array[], shape: InputShape): ChannelStats {
  const plane = shape.width * shape.height;
  const mean: number[] = [];
  const std: number[] = [];
  for (let channel = 0; channel < shape.channels; channel += 1) {
    let sum = 0;
    let sumSquares = 0;
    let count = 0;
    for (const vector of vectors) {
      for (let i = channel * plane; i < (channel + 1) * plane; i += 1) {
        sum += vector[i];
        sumSquares += vector[i] * vector[i];
        count += 1;
      }
    }
    const channelMean = count > 0 ? sum / count : 0;
    const variance = count > 0 ? Math.max(0, sumSquares / count - channelMean * channelMean) : 0;
    mean.push(channelMean);
    std.push(Math.sqrt(variance));
  }
  return { mean, std };
}

export function normalizeVector(vector: Float32Array, params: PreprocessingParams): Float32Array {
  const plane = params.width * params.height;
  const output = new Float32Array(vector.length);
  for (let i = 0; i < vector.length; i += 1) {
    const channel = Math.min(params.channels - 1, Math.floor(i / plane));
    const std = Math.max(MIN_STD, params.std[channel] ?? 1);
    output[i] = (vector[i] - (params.mean[channel] ?? 0)) / std;
  }
  return output;
}

export function preprocessFrame(frame: Frame, params: PreprocessingParams): Float32Array {
  return normalizeVector(scaleFrame(frame, params), params);
}

export function buildPreprocessing(shape: InputShape, stats: ChannelStats): PreprocessingParams {
  return {
    width: shape.width,
    height: shape.height,
    channels: shape.channels,
    mean: stats.mean,
    std: stats.std.map(value => Math.max(MIN_STD, value))
  };
}
