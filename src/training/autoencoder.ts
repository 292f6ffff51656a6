import { SentinelError } from '../errors.js';
import { isRecord } from '../config/index.js';
import { createSeededRandom, type RandomSource } from '../utils/random.js';

export const LINEAR_AUTOENCODER_FORMAT = 'linear-autoencoder';

const ADAM_BETA1 = 0.9;
const ADAM_BETA2 = 0.999;
const ADAM_EPSILON = 1e-8;

export interface ReconstructionModel {
  readonly inputSize: number;
  reconstruct(input: Float32Array): Float32Array;
}

export interface TrainableModel extends ReconstructionModel {
  trainBatch(batch: Float32Array[]): number;
  snapshot(): ModelParameters;
  restore(parameters: ModelParameters): void;
  serialize(): Buffer;
}

export type ModelParameters = {
  encoderWeights: Float32Array;
  encoderBias: Float32Array;
  decoderWeights: Float32Array;
  decoderBias: Float32Array;
};

export type AutoencoderOptions = {
  inputSize: number;
  latentDim: number;
  learningRate: number;
  seed?: number;
};

type AdamState = {
  m: Float32Array;
  v: Float32Array;
};

export function meanSquaredError(input: Float32Array, output: Float32Array): number {
  if (input.length === 0) {
    return 0;
  }
  let sum = 0;
  for (let i = 0; i < input.length; i += 1) {
    const diff = output[i] - input[i];
    sum += diff * diff;
  }
  return sum / input.length;
}

export function reconstructionError(model: ReconstructionModel, input: Float32Array): number {
  return meanSquaredError(input, model.reconstruct(input));
}

/**
 * Single-hidden-layer linear autoencoder trained with Adam on MSE.
 * Weights are row-major: encoder is latentDim x inputSize, decoder is
 * inputSize x latentDim.
 */
export class LinearAutoencoder implements TrainableModel {
  readonly inputSize: number;
  readonly latentDim: number;
  private readonly learningRate: number;
  private params: ModelParameters;
  private readonly adam: Record<keyof ModelParameters, AdamState>;
  private step = 0;

  constructor(options: AutoencoderOptions, parameters?: ModelParameters) {
    if (!Number.isInteger(options.inputSize) || options.inputSize <= 0) {
      throw new RangeError('inputSize must be a positive integer');
    }
    if (!Number.isInteger(options.latentDim) || options.latentDim <= 0 || options.latentDim >= options.inputSize) {
      throw new RangeError('latentDim must be a positive integer below inputSize');
    }
    this.inputSize = options.inputSize;
    this.latentDim = options.latentDim;
    this.learningRate = options.learningRate;
    this.params = parameters ?? initialParameters(options.inputSize, options.latentDim, createSeededRandom(options.seed ?? 1));
    this.adam = {
      encoderWeights: createAdamState(this.params.encoderWeights.length),
      encoderBias: createAdamState(this.params.encoderBias.length),
      decoderWeights: createAdamState(this.params.decoderWeights.length),
      decoderBias: createAdamState(this.params.decoderBias.length)
    };
  }

  encode(input: Float32Array): Float32Array {
    const { encoderWeights, encoderBias } = this.params;
    const latent = new Float32Array(this.latentDim);
    for (let k = 0; k < this.latentDim; k += 1) {
      let sum = encoderBias[k];
      const row = k * this.inputSize;
      for (let i = 0; i < this.inputSize; i += 1) {
        sum += encoderWeights[row + i] * input[i];
      }
      latent[k] = sum;
    }
    return latent;
  }

  decode(latent: Float32Array): Float32Array {
    const { decoderWeights, decoderBias } = this.params;
    const output = new Float32Array(this.inputSize);
    for (let i = 0; i < this.inputSize; i += 1) {
      let sum = decoderBias[i];
      const row = i * this.latentDim;
      for (let k = 0; k < this.latentDim; k += 1) {
        sum += decoderWeights[row + k] * latent[k];
      }
      output[i] = sum;
    }
    return output;
  }

  reconstruct(input: Float32Array): Float32Array {
    this.assertInput(input);
    return this.decode(this.encode(input));
  }

  trainBatch(batch: Float32Array[]): number {
    if (batch.length === 0) {
      return 0;
    }
    const grads: ModelParameters = {
      encoderWeights: new Float32Array(this.params.encoderWeights.length),
      encoderBias: new Float32Array(this.latentDim),
      decoderWeights: new Float32Array(this.params.decoderWeights.length),
      decoderBias: new Float32Array(this.inputSize)
    };
    const { decoderWeights } = this.params;
    let totalLoss = 0;

    for (const input of batch) {
      this.assertInput(input);
      const latent = this.encode(input);
      const output = this.decode(latent);
      const outputGrad = new Float32Array(this.inputSize);
      let loss = 0;
      for (let i = 0; i < this.inputSize; i += 1) {
        const diff = output[i] - input[i];
        loss += diff * diff;
        outputGrad[i] = (2 * diff) / this.inputSize;
      }
      totalLoss += loss / this.inputSize;

      const latentGrad = new Float32Array(this.latentDim);
      for (let i = 0; i < this.inputSize; i += 1) {
        const g = outputGrad[i];
        grads.decoderBias[i] += g;
        const row = i * this.latentDim;
        for (let k = 0; k < this.latentDim; k += 1) {
          grads.decoderWeights[row + k] += g * latent[k];
          latentGrad[k] += decoderWeights[row + k] * g;
        }
      }
      for (let k = 0; k < this.latentDim; k += 1) {
        const g = latentGrad[k];
        grads.encoderBias[k] += g;
        const row = k * this.inputSize;
        for (let i = 0; i < this.inputSize; i += 1) {
          grads.encoderWeights[row + i] += g * input[i];
        }
      }
    }

    const scale = 1 / batch.length;
    this.step += 1;
    this.applyAdam('encoderWeights', grads.encoderWeights, scale);
    this.applyAdam('encoderBias', grads.encoderBias, scale);
    this.applyAdam('decoderWeights', grads.decoderWeights, scale);
    this.applyAdam('decoderBias', grads.decoderBias, scale);

    return totalLoss / batch.length;
  }

  snapshot(): ModelParameters {
    return {
      encoderWeights: this.params.encoderWeights.slice(),
      encoderBias: this.params.encoderBias.slice(),
      decoderWeights: this.params.decoderWeights.slice(),
      decoderBias: this.params.decoderBias.slice()
    };
  }

  restore(parameters: ModelParameters) {
    this.params = {
      encoderWeights: parameters.encoderWeights.slice(),
      encoderBias: parameters.encoderBias.slice(),
      decoderWeights: parameters.decoderWeights.slice(),
      decoderBias: parameters.decoderBias.slice()
    };
  }

  serialize(): Buffer {
    const payload = {
      format: LINEAR_AUTOENCODER_FORMAT,
      inputSize: this.inputSize,
      latentDim: this.latentDim,
      encoderWeights: encodeFloats(this.params.encoderWeights),
      encoderBias: encodeFloats(this.params.encoderBias),
      decoderWeights: encodeFloats(this.params.decoderWeights),
      decoderBias: encodeFloats(this.params.decoderBias)
    };
    return Buffer.from(JSON.stringify(payload), 'utf8');
  }

  static deserialize(artifact: Uint8Array): LinearAutoencoder {
    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(artifact).toString('utf8'));
    } catch (error) {
      throw new SentinelError('BlobCorrupted', 'Model artifact is not readable', { cause: error });
    }
    if (!isRecord(parsed) || parsed.format !== LINEAR_AUTOENCODER_FORMAT) {
      throw new SentinelError('BlobCorrupted', 'Model artifact has an unknown format');
    }
    const inputSize = parsed.inputSize;
    const latentDim = parsed.latentDim;
    if (typeof inputSize !== 'number' || typeof latentDim !== 'number') {
      throw new SentinelError('BlobCorrupted', 'Model artifact is missing its shape');
    }
    const parameters: ModelParameters = {
      encoderWeights: decodeFloats(parsed.encoderWeights, inputSize * latentDim),
      encoderBias: decodeFloats(parsed.encoderBias, latentDim),
      decoderWeights: decodeFloats(parsed.decoderWeights, inputSize * latentDim),
      decoderBias: decodeFloats(parsed.decoderBias, inputSize)
    };
    try {
      return new LinearAutoencoder({ inputSize, latentDim, learningRate: 0 }, parameters);
    } catch (error) {
      throw new SentinelError('BlobCorrupted', 'Model artifact has an invalid shape', { cause: error });
    }
  }

  private applyAdam(name: keyof ModelParameters, grad: Float32Array, scale: number) {
    const values = this.params[name];
    const state = this.adam[name];
    const correction1 = 1 - ADAM_BETA1 ** this.step;
    const correction2 = 1 - ADAM_BETA2 ** this.step;
    for (let i = 0; i < values.length; i += 1) {
      const g = grad[i] * scale;
      state.m[i] = ADAM_BETA1 * state.m[i] + (1 - ADAM_BETA1) * g;
      state.v[i] = ADAM_BETA2 * state.v[i] + (1 - ADAM_BETA2) * g * g;
      const mHat = state.m[i] / correction1;
      const vHat = state.v[i] / correction2;
      values[i] -= (this.learningRate * mHat) / (Math.sqrt(vHat) + ADAM_EPSILON);
    }
  }

  private assertInput(input: Float32Array) {
    if (input.length !== this.inputSize) {
      throw new SentinelError('InvalidSnapshot', `Expected ${this.inputSize} inputs, received ${input.length}`);
    }
  }
}

function initialParameters(inputSize: number, latentDim: number, random: RandomSource): ModelParameters {
  const limit = Math.sqrt(6 / (inputSize + latentDim));
  const uniform = () => (random() * 2 - 1) * limit;
  const encoderWeights = new Float32Array(inputSize * latentDim);
  const decoderWeights = new Float32Array(inputSize * latentDim);
  for (let i = 0; i < encoderWeights.length; i += 1) {
    encoderWeights[i] = uniform();
    decoderWeights[i] = uniform();
  }
  return {
    encoderWeights,
    encoderBias: new Float32Array(latentDim),
    decoderWeights,
    decoderBias: new Float32Array(inputSize)
  };
}

function createAdamState(size: number): AdamState {
  return { m: new Float32Array(size), v: new Float32Array(size) };
}

function encodeFloats(values: Float32Array): string {
  const bytes = Buffer.alloc(values.length * 4);
  values.forEach((value, index) => bytes.writeFloatLE(value, index * 4));
  return bytes.toString('base64');
}

function decodeFloats(raw: unknown, expectedLength: number): Float32Array {
  if (typeof raw !== 'string') {
    throw new SentinelError('BlobCorrupted', 'Model artifact is missing parameters');
  }
  const bytes = Buffer.from(raw, 'base64');
  if (bytes.length !== expectedLength * 4) {
    throw new SentinelError('BlobCorrupted', 'Model artifact parameters have the wrong length');
  }
  const values = new Float32Array(expectedLength);
  for (let i = 0; i < expectedLength; i += 1) {
    values[i] = bytes.readFloatLE(i * 4);
  }
  return values;
}
