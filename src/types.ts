import type { ErrorCode } from './errors.js';

export type SnapshotLabel = 'normal' | 'threat' | 'abnormal' | 'custom';

export const SNAPSHOT_LABELS: readonly SnapshotLabel[] = ['normal', 'threat', 'abnormal', 'custom'];

export type Resolution = {
  width: number;
  height: number;
};

export type CameraHealth = 'ok' | 'no_model' | 'degraded';

export interface Camera {
  id: string;
  name: string;
  resolution: Resolution;
  profile: string | null;
  activeModelId: string | null;
  threshold: number | null;
  createdAt: number;
}

export interface LabeledSnapshot {
  id: string;
  cameraId: string;
  label: SnapshotLabel;
  capturedAt: number;
  conditions: string | null;
  contentKey: string;
  sizeBytes: number;
  createdAt: number;
}

export type DatasetStatus = 'open' | 'closed' | 'superseded';

export type LabelCounts = Record<SnapshotLabel, number>;

export interface Dataset {
  id: string;
  cameraId: string;
  version: number;
  status: DatasetStatus;
  supersedes: string | null;
  labelCounts: LabelCounts;
  snapshotCount: number;
  totalBytes: number;
  createdAt: number;
  closedAt: number | null;
}

export type TrainingJobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export interface TrainingHyperparameters {
  inputWidth: number;
  inputHeight: number;
  channels: 1 | 3;
  latentDim: number;
  learningRate: number;
  batchSize: number;
  maxEpochs: number;
  patience: number;
  holdoutFraction: number;
  thresholdPercentile: number;
  seed: number;
}

export interface TrainingProgress {
  epoch: number;
  loss: number | null;
  validationError: number | null;
  bestValidationError: number | null;
}

export interface JobFailure {
  code: ErrorCode;
  reason: string;
}

export interface TrainingJob {
  id: string;
  cameraId: string;
  datasetId: string;
  hyperparameters: TrainingHyperparameters;
  status: TrainingJobStatus;
  progress: TrainingProgress;
  modelVersionId: string | null;
  failure: JobFailure | null;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
}

export type ModelState = 'trained' | 'validated' | 'deployed' | 'superseded' | 'rolled_back' | 'archived';

export type ModelFormat = 'linear-autoencoder' | 'onnx-autoencoder';

export interface PreprocessingParams {
  width: number;
  height: number;
  channels: 1 | 3;
  mean: number[];
  std: number[];
}

export interface ModelStateChange {
  state: ModelState;
  at: number;
  reason?: string;
}

export interface TrainingStats {
  epochs: number;
  trainingSize: number;
  validationSize: number;
  meanTrainingError: number;
  maxObservedError: number;
}

export interface ModelVersion {
  id: string;
  cameraId: string;
  trainingJobId: string | null;
  datasetId: string | null;
  version: number;
  artifactKey: string;
  checksum: string;
  format: ModelFormat;
  sizeBytes: number;
  preprocessing: PreprocessingParams;
  threshold: number;
  validationError: number;
  trainingStats: TrainingStats | null;
  holdoutKeys: string[];
  state: ModelState;
  stateHistory: ModelStateChange[];
  createdAt: number;
  updatedAt: number;
  deployedAt: number | null;
}

export interface TimeWindow {
  startMinute: number;
  endMinute: number;
}

/** Share of the window's snapshots that contained the class. */
export interface WindowFrequency extends TimeWindow {
  frequency: number;
}

export interface ObjectProfile {
  objectClass: string;
  frequency: number;
  occurrences: number;
  typicalCountRange: [number, number];
  percentileCountRange: [number, number];
  meanCount: number;
  typicalPositions: number[];
  typicalTimeWindows: TimeWindow[];
  windowFrequencies: WindowFrequency[];
}

export interface BaselineInventory {
  id: string;
  cameraId: string;
  version: number;
  datasetId: string;
  snapshotCount: number;
  gridSize: number;
  profiles: ObjectProfile[];
  createdAt: number;
}

export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface DetectedObject {
  objectClass: string;
  confidence: number;
  bbox: BoundingBox;
  frameIndex: number;
}

export interface DetectionResult {
  objects: DetectedObject[];
  framesAnalyzed: number;
  degraded: boolean;
  timedOut: boolean;
  durationMs: number;
  completedAt: number;
}

export type EventStatus = 'received' | 'analyzing' | 'analyzed';

export interface EventSubmission {
  id: string;
  cameraId: string;
  triggeredAt: number;
  modelVersionId: string | null;
  reconstructionError: number;
  threshold: number;
  frameKeys: string[];
  frameTimestamps: number[];
  triggerFrameIndex: number;
  clipKey: string | null;
}

export interface SentinelEvent extends EventSubmission {
  clipCoverageMs: number;
  status: EventStatus;
  degraded: boolean;
  shed: boolean;
  detection: DetectionResult | null;
  verdictId: string | null;
  receivedAt: number;
  analyzedAt: number | null;
}

export type AnomalyType =
  | 'new_object'
  | 'missing_object'
  | 'abnormal_count'
  | 'abnormal_time'
  | 'unusual_path'
  | 'unusual_dwell'
  | 'none';

export type RiskLevel = 'critical' | 'warning' | 'normal' | 'false_positive';

export interface VerdictEvidence {
  objectClass: string | null;
  observedCount: number | null;
  expectedRange: [number, number] | null;
  expectedFrequency: number | null;
  minuteOfDay: number;
  baselineWindows: TimeWindow[];
  observedCells: number[];
  dwellMs: number | null;
  clipCoverageMs: number;
  reconstructionError: number;
  threshold: number;
  baselineVersion: number | null;
}

export interface VerdictDraft {
  eventId: string;
  cameraId: string;
  anomalyType: AnomalyType;
  confidence: number;
  evidence: VerdictEvidence;
  correlatedEventIds: string[];
  degraded: boolean;
}

export interface AnomalyVerdict {
  id: string;
  eventId: string;
  cameraId: string;
  version: number;
  anomalyType: AnomalyType;
  riskLevel: RiskLevel;
  score: number;
  confidence: number;
  explanation: string;
  correlatedEventIds: string[];
  evidence: VerdictEvidence;
  degraded: boolean;
  createdAt: number;
}

export type FeedbackKind = 'false_positive' | 'confirmed_threat';

export interface FeedbackSignal {
  id: string;
  verdictId: string;
  eventId: string;
  cameraId: string;
  anomalyType: AnomalyType;
  kind: FeedbackKind;
  createdAt: number;
}

export interface SnapshotFlag {
  id: number;
  eventId: string;
  frameKey: string;
  reason: FeedbackKind;
  createdAt: number;
}
