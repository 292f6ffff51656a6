import fs from 'node:fs';
import * as ort from 'onnxruntime-node';
import type { DetectorConfig } from '../config/index.js';
import { SentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import { readPixel, type Frame } from '../video/utils.js';
import { parseYoloDetections, type LetterboxMeta, type YoloLayout } from '../video/yoloParser.js';
import { UnavailableDetector, type FrameDetections, type ObjectDetector } from './detector.js';

const DEFAULT_INPUT_SIZE = 640;
const LETTERBOX_FILL = 114 / 255;

export type YoloDetectorOptions = {
  labels: string[];
  inputSize?: number;
  scoreThreshold?: number;
  nmsThreshold?: number;
  maxDetections?: number;
  layout?: YoloLayout;
  batchSize?: number;
};

export type DetectorSession = Pick<ort.InferenceSession, 'inputNames' | 'outputNames' | 'run'>;

export class YoloDetector implements ObjectDetector {
  readonly name = 'yolo';
  readonly maxBatchSize: number;
  private readonly inputSize: number;
  private readonly inputName: string;
  private readonly outputName: string;

  constructor(
    private readonly session: DetectorSession,
    private readonly options: YoloDetectorOptions
  ) {
    const inputName = session.inputNames[0];
    const outputName = session.outputNames[0];
    if (!inputName || !outputName) {
      throw new SentinelError('InvalidArgument', 'Detector model must declare an input and an output');
    }
    if (options.labels.length === 0) {
      throw new SentinelError('InvalidArgument', 'Detector needs at least one class label');
    }
    this.inputName = inputName;
    this.outputName = outputName;
    this.inputSize = options.inputSize ?? DEFAULT_INPUT_SIZE;
    this.maxBatchSize = Math.max(1, options.batchSize ?? 1);
  }

  available() {
    return true;
  }

  async detect(frames: Frame[]): Promise<FrameDetections[]> {
    const results: FrameDetections[] = [];
    for (let start = 0; start < frames.length; start += this.maxBatchSize) {
      const batch = frames.slice(start, start + this.maxBatchSize);
      results.push(...(await this.detectBatch(batch)));
    }
    return results;
  }

  private async detectBatch(frames: Frame[]): Promise<FrameDetections[]> {
    if (frames.length === 0) {
      return [];
    }
    const size = this.inputSize;
    const perFrame = 3 * size * size;
    const input = new Float32Array(perFrame * frames.length);
    const metas = frames.map((frame, index) => letterbox(frame, size, input.subarray(index * perFrame)));
    const tensor = new ort.Tensor('float32', input, [frames.length, 3, size, size]);
    const outputs = await this.session.run({ [this.inputName]: tensor });
    const output = outputs[this.outputName];
    if (!output || !(output.data instanceof Float32Array) || output.dims.length !== 3 || output.dims[0] !== frames.length) {
      throw new SentinelError('InvalidArgument', 'Detector output has an unexpected shape');
    }
    const data = output.data;
    const [, rows, columns] = output.dims;
    const stride = rows * columns;

    return metas.map((meta, index) => {
      const slice = new ort.Tensor('float32', data.subarray(index * stride, (index + 1) * stride), [1, rows, columns]);
      const detections = parseYoloDetections(slice, meta, {
        classCount: this.options.labels.length,
        layout: this.options.layout,
        scoreThreshold: this.options.scoreThreshold,
        nmsThreshold: this.options.nmsThreshold,
        maxDetections: this.options.maxDetections
      });
      return detections.map(detection => ({
        objectClass: this.options.labels[detection.classId] ?? `class_${detection.classId}`,
        confidence: detection.score,
        bbox: {
          left: detection.bbox.left / meta.originalWidth,
          top: detection.bbox.top / meta.originalHeight,
          width: detection.bbox.width / meta.originalWidth,
          height: detection.bbox.height / meta.originalHeight
        }
      }));
    });
  }
}

export async function createObjectDetector(config: DetectorConfig | undefined, log: Logger = logger): Promise<ObjectDetector> {
  const detectorLog = log.child({ component: 'detector' });
  if (!config) {
    return new UnavailableDetector();
  }
  let session: ort.InferenceSession;
  try {
    session = await ort.InferenceSession.create(config.modelPath);
  } catch (error) {
    if (!isMissingModelError(error)) {
      throw error;
    }
    detectorLog.warn({ modelPath: config.modelPath }, 'Detector model not found; deep analysis runs degraded');
    return new UnavailableDetector(`Detector model ${config.modelPath} not found`);
  }
  const labels = config.labels ?? loadLabels(config.labelsPath);
  detectorLog.info({ modelPath: config.modelPath, classes: labels.length }, 'Detector model loaded');
  return new YoloDetector(session, {
    labels,
    inputSize: config.inputSize,
    scoreThreshold: config.scoreThreshold,
    nmsThreshold: config.nmsThreshold,
    maxDetections: config.maxDetections
  });
}

export function loadLabels(labelsPath: string | undefined): string[] {
  if (!labelsPath) {
    throw new SentinelError('InvalidArgument', 'Detector labels are not configured');
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(labelsPath, 'utf-8'));
  if (!Array.isArray(parsed) || !parsed.every(label => typeof label === 'string')) {
    throw new SentinelError('InvalidArgument', `Labels file ${labelsPath} must be a JSON array of strings`);
  }
  return parsed;
}

/** Writes the letterboxed CHW image into `target` and returns the mapping back to the frame. */
export function letterbox(frame: Frame, size: number, target: Float32Array): LetterboxMeta {
  const { width, height } = frame;
  const scale = Math.min(size / width, size / height);
  const resizedWidth = Math.max(1, Math.round(width * scale));
  const resizedHeight = Math.max(1, Math.round(height * scale));
  const padX = Math.floor((size - resizedWidth) / 2);
  const padY = Math.floor((size - resizedHeight) / 2);
  const pixels = size * size;
  target.fill(LETTERBOX_FILL, 0, 3 * pixels);

  for (let y = 0; y < resizedHeight; y += 1) {
    const srcY = Math.min(height - 1, Math.floor(y / scale));
    for (let x = 0; x < resizedWidth; x += 1) {
      const srcX = Math.min(width - 1, Math.floor(x / scale));
      const destIndex = (y + padY) * size + x + padX;
      const [r, g, b] = readPixel(frame, srcY * width + srcX);
      target[destIndex] = r / 255;
      target[pixels + destIndex] = g / 255;
      target[2 * pixels + destIndex] = b / 255;
    }
  }

  return { inputSize: size, scale, padX, padY, originalWidth: width, originalHeight: height };
}

function isMissingModelError(error: unknown) {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string' && error.code.toLowerCase() === 'enoent') {
    return true;
  }
  const message = error.message.toLowerCase();
  return message.includes("file doesn't exist") || message.includes('no such file');
}
