import type * as ort from 'onnxruntime-node';
import { clamp } from './utils.js';

export type LetterboxMeta = {
  inputSize: number;
  scale: number;
  padX: number;
  padY: number;
  originalWidth: number;
  originalHeight: number;
};

export type PixelBox = {
  left: number;
  top: number;
  width: number;
  height: number;
};

export type YoloDetection = {
  classId: number;
  score: number;
  bbox: PixelBox;
};

export type YoloLayout = 'v5' | 'v8' | 'auto';

export interface ParseYoloDetectionsOptions {
  classCount: number;
  layout?: YoloLayout;
  scoreThreshold?: number;
  nmsThreshold?: number;
  maxDetections?: number;
}

type TensorAccessor = {
  attributes: number;
  detections: number;
  get(detectionIndex: number, attributeIndex: number): number;
};

const BOX_ATTRIBUTES = 4;
const DEFAULT_SCORE_THRESHOLD = 0.35;
export const DEFAULT_NMS_IOU_THRESHOLD = 0.45;

export function parseYoloDetections(
  tensor: ort.Tensor,
  meta: LetterboxMeta,
  options: ParseYoloDetectionsOptions
): YoloDetection[] {
  const accessor = createTensorAccessor(tensor, options.classCount);
  if (!accessor) {
    return [];
  }
  const classStart = resolveClassStart(accessor.attributes, options);
  const hasObjectness = classStart === BOX_ATTRIBUTES + 1;
  const classCount = Math.min(options.classCount, accessor.attributes - classStart);
  const scoreThreshold = options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;

  const candidates: YoloDetection[] = [];
  for (let index = 0; index < accessor.detections; index += 1) {
    const objectness = hasObjectness ? accessor.get(index, BOX_ATTRIBUTES) : 1;
    if (!Number.isFinite(objectness) || objectness <= 0) {
      continue;
    }
    let bestClass = -1;
    let bestScore = 0;
    for (let classId = 0; classId < classCount; classId += 1) {
      const score = accessor.get(index, classStart + classId) * objectness;
      if (Number.isFinite(score) && score > bestScore) {
        bestScore = score;
        bestClass = classId;
      }
    }
    if (bestClass < 0 || bestScore < scoreThreshold) {
      continue;
    }
    const bbox = projectBox(
      accessor.get(index, 0),
      accessor.get(index, 1),
      accessor.get(index, 2),
      accessor.get(index, 3),
      meta
    );
    if (!bbox) {
      continue;
    }
    candidates.push({ classId: bestClass, score: Math.min(1, bestScore), bbox });
  }

  const kept = nonMaxSuppression(candidates, options.nmsThreshold ?? DEFAULT_NMS_IOU_THRESHOLD);
  return kept.slice(0, Math.max(1, options.maxDetections ?? kept.length));
}

export function nonMaxSuppression(detections: YoloDetection[], threshold: number): YoloDetection[] {
  const sorted = [...detections].sort((a, b) => b.score - a.score);
  const kept: YoloDetection[] = [];
  for (const candidate of sorted) {
    const overlaps = kept.some(
      existing => existing.classId === candidate.classId && computeIoU(existing.bbox, candidate.bbox) > threshold
    );
    if (!overlaps) {
      kept.push(candidate);
    }
  }
  return kept;
}

export function computeIoU(a: PixelBox, b: PixelBox) {
  const x1 = Math.max(a.left, b.left);
  const y1 = Math.max(a.top, b.top);
  const x2 = Math.min(a.left + a.width, b.left + b.width);
  const y2 = Math.min(a.top + a.height, b.top + b.height);
  const intersection = Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
  const union = a.width * a.height + b.width * b.height - intersection;
  return union <= 0 ? 0 : intersection / union;
}

function resolveClassStart(attributes: number, options: ParseYoloDetectionsOptions) {
  if (options.layout === 'v5') {
    return BOX_ATTRIBUTES + 1;
  }
  if (options.layout === 'v8') {
    return BOX_ATTRIBUTES;
  }
  return attributes === options.classCount + BOX_ATTRIBUTES + 1 ? BOX_ATTRIBUTES + 1 : BOX_ATTRIBUTES;
}

function projectBox(cx: number, cy: number, width: number, height: number, meta: LetterboxMeta): PixelBox | null {
  if (![cx, cy, width, height].every(Number.isFinite) || width <= 0 || height <= 0) {
    return null;
  }
  const left = clamp((cx - width / 2 - meta.padX) / meta.scale, 0, meta.originalWidth);
  const top = clamp((cy - height / 2 - meta.padY) / meta.scale, 0, meta.originalHeight);
  const right = clamp((cx + width / 2 - meta.padX) / meta.scale, 0, meta.originalWidth);
  const bottom = clamp((cy + height / 2 - meta.padY) / meta.scale, 0, meta.originalHeight);
  if (right - left <= 0 || bottom - top <= 0) {
    return null;
  }
  return { left, top, width: right - left, height: bottom - top };
}

/**
 * Exports differ on whether attributes lead ([1, 84, 8400]) or trail
 * ([1, 8400, 84]); the side matching the class count wins.
 */
function createTensorAccessor(tensor: ort.Tensor, classCount: number): TensorAccessor | null {
  const data = tensor.data;
  if (!(data instanceof Float32Array) || data.length === 0) {
    return null;
  }
  const dims = tensor.dims.length > 0 && tensor.dims[0] === 1 ? tensor.dims.slice(1) : [...tensor.dims];
  if (dims.length !== 2) {
    return null;
  }
  const [first, second] = dims;
  const expected = new Set([classCount + BOX_ATTRIBUTES, classCount + BOX_ATTRIBUTES + 1]);
  const attributesFirst = expected.has(first) || (!expected.has(second) && first < second);
  if (attributesFirst) {
    return {
      attributes: first,
      detections: second,
      get: (detectionIndex, attributeIndex) => data[attributeIndex * second + detectionIndex]
    };
  }
  return {
    attributes: second,
    detections: first,
    get: (detectionIndex, attributeIndex) => data[detectionIndex * second + attributeIndex]
  };
}
