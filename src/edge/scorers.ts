import * as ort from 'onnxruntime-node';
import { SentinelError } from '../errors.js';
import {
  LINEAR_AUTOENCODER_FORMAT,
  LinearAutoencoder,
  meanSquaredError,
  reconstructionError
} from '../training/autoencoder.js';
import type { ModelFormat, PreprocessingParams } from '../types.js';

export interface ReconstructionScorer {
  readonly format: ModelFormat;
  score(input: Float32Array): Promise<number>;
}

class LinearScorer implements ReconstructionScorer {
  readonly format = LINEAR_AUTOENCODER_FORMAT;

  constructor(private readonly model: LinearAutoencoder) {}

  async score(input: Float32Array) {
    return reconstructionError(this.model, input);
  }
}

class OnnxScorer implements ReconstructionScorer {
  readonly format = 'onnx-autoencoder';

  constructor(
    private readonly session: ort.InferenceSession,
    private readonly preprocessing: PreprocessingParams
  ) {}

  async score(input: Float32Array) {
    const inputName = this.session.inputNames[0];
    if (!inputName) {
      throw new SentinelError('BlobCorrupted', 'ONNX model declares no inputs');
    }
    const { channels, height, width } = this.preprocessing;
    const tensor = new ort.Tensor('float32', input, [1, channels, height, width]);
    const results = await this.session.run({ [inputName]: tensor });
    const outputName = this.session.outputNames[0] ?? Object.keys(results)[0];
    const output = outputName ? results[outputName] : undefined;
    if (!output || !(output.data instanceof Float32Array) || output.data.length !== input.length) {
      throw new SentinelError('BlobCorrupted', 'ONNX model output does not match its input shape');
    }
    return meanSquaredError(input, output.data);
  }
}

export async function createScorer(
  format: ModelFormat,
  artifact: Uint8Array,
  preprocessing: PreprocessingParams
): Promise<ReconstructionScorer> {
  if (format === LINEAR_AUTOENCODER_FORMAT) {
    const model = LinearAutoencoder.deserialize(artifact);
    const expected = preprocessing.width * preprocessing.height * preprocessing.channels;
    if (model.inputSize !== expected) {
      throw new SentinelError('BlobCorrupted', 'Model input size does not match its preprocessing');
    }
    return new LinearScorer(model);
  }
  try {
    const session = await ort.InferenceSession.create(Buffer.from(artifact));
    return new OnnxScorer(session, preprocessing);
  } catch (error) {
    throw new SentinelError('BlobCorrupted', 'ONNX model could not be loaded', { cause: error });
  }
}
