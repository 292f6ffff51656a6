import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type {
  AnomalyType,
  AnomalyVerdict,
  BaselineInventory,
  Camera,
  Dataset,
  DatasetStatus,
  DetectionResult,
  EventStatus,
  FeedbackKind,
  FeedbackSignal,
  LabelCounts,
  LabeledSnapshot,
  ModelFormat,
  ModelState,
  ModelStateChange,
  ModelVersion,
  ObjectProfile,
  PreprocessingParams,
  RiskLevel,
  SentinelEvent,
  SnapshotFlag,
  SnapshotLabel,
  TrainingHyperparameters,
  TrainingJob,
  TrainingJobStatus,
  TrainingProgress,
  TrainingStats,
  VerdictEvidence
} from './types.js';
import type { ErrorCode } from './errors.js';

export const SCHEMA_VERSION = 1;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS cameras (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    width INTEGER NOT NULL,
    height INTEGER NOT NULL,
    profile TEXT,
    active_model_id TEXT,
    threshold REAL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS snapshots (
    id TEXT PRIMARY KEY,
    camera_id TEXT NOT NULL REFERENCES cameras(id),
    label TEXT NOT NULL,
    captured_at INTEGER NOT NULL,
    conditions TEXT,
    content_key TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS datasets (
    id TEXT PRIMARY KEY,
    camera_id TEXT NOT NULL REFERENCES cameras(id),
    version INTEGER NOT NULL,
    status TEXT NOT NULL,
    supersedes TEXT,
    created_at INTEGER NOT NULL,
    closed_at INTEGER,
    UNIQUE (camera_id, version)
  );

  CREATE TABLE IF NOT EXISTS dataset_snapshots (
    dataset_id TEXT NOT NULL REFERENCES datasets(id),
    snapshot_id TEXT NOT NULL REFERENCES snapshots(id),
    PRIMARY KEY (dataset_id, snapshot_id)
  );

  CREATE TABLE IF NOT EXISTS training_jobs (
    id TEXT PRIMARY KEY,
    camera_id TEXT NOT NULL REFERENCES cameras(id),
    dataset_id TEXT NOT NULL REFERENCES datasets(id),
    hyperparameters TEXT NOT NULL,
    status TEXT NOT NULL,
    progress TEXT NOT NULL,
    model_version_id TEXT,
    failure_code TEXT,
    failure_reason TEXT,
    created_at INTEGER NOT NULL,
    started_at INTEGER,
    finished_at INTEGER
  );

  CREATE TABLE IF NOT EXISTS model_versions (
    id TEXT PRIMARY KEY,
    camera_id TEXT NOT NULL REFERENCES cameras(id),
    training_job_id TEXT,
    dataset_id TEXT,
    version INTEGER NOT NULL,
    artifact_key TEXT NOT NULL,
    checksum TEXT NOT NULL,
    format TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    preprocessing TEXT NOT NULL,
    threshold REAL NOT NULL,
    validation_error REAL NOT NULL,
    training_stats TEXT,
    holdout_keys TEXT NOT NULL,
    state TEXT NOT NULL,
    state_history TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    deployed_at INTEGER,
    UNIQUE (camera_id, version)
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_models_single_deployed
    ON model_versions (camera_id) WHERE state = 'deployed';

  CREATE TABLE IF NOT EXISTS baseline_inventories (
    id TEXT PRIMARY KEY,
    camera_id TEXT NOT NULL REFERENCES cameras(id),
    version INTEGER NOT NULL,
    dataset_id TEXT NOT NULL,
    snapshot_count INTEGER NOT NULL,
    grid_size INTEGER NOT NULL,
    profiles TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    UNIQUE (camera_id, version)
  );

  CREATE TABLE IF NOT EXISTS events (
    id TEXT PRIMARY KEY,
    camera_id TEXT NOT NULL REFERENCES cameras(id),
    triggered_at INTEGER NOT NULL,
    model_version_id TEXT,
    reconstruction_error REAL NOT NULL,
    threshold REAL NOT NULL,
    frame_keys TEXT NOT NULL,
    frame_timestamps TEXT NOT NULL,
    trigger_frame_index INTEGER NOT NULL,
    clip_key TEXT,
    clip_coverage_ms INTEGER NOT NULL,
    status TEXT NOT NULL,
    degraded INTEGER NOT NULL DEFAULT 0,
    shed INTEGER NOT NULL DEFAULT 0,
    detection TEXT,
    verdict_id TEXT,
    received_at INTEGER NOT NULL,
    analyzed_at INTEGER
  );

  CREATE TABLE IF NOT EXISTS verdicts (
    id TEXT PRIMARY KEY,
    event_id TEXT NOT NULL REFERENCES events(id),
    camera_id TEXT NOT NULL,
    version INTEGER NOT NULL,
    anomaly_type TEXT NOT NULL,
    risk_level TEXT NOT NULL,
    score REAL NOT NULL,
    confidence REAL NOT NULL,
    explanation TEXT NOT NULL,
    correlated_event_ids TEXT NOT NULL,
    evidence TEXT NOT NULL,
    degraded INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    UNIQUE (event_id, version)
  );

  CREATE TABLE IF NOT EXISTS feedback_signals (
    id TEXT PRIMARY KEY,
    verdict_id TEXT NOT NULL REFERENCES verdicts(id),
    event_id TEXT NOT NULL,
    camera_id TEXT NOT NULL,
    anomaly_type TEXT NOT NULL,
    kind TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS snapshot_flags (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    event_id TEXT NOT NULL,
    frame_key TEXT NOT NULL,
    reason TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_snapshots_camera ON snapshots (camera_id, captured_at);
  CREATE INDEX IF NOT EXISTS idx_datasets_camera ON datasets (camera_id, status);
  CREATE INDEX IF NOT EXISTS idx_jobs_camera_status ON training_jobs (camera_id, status);
  CREATE INDEX IF NOT EXISTS idx_models_camera_state ON model_versions (camera_id, state);
  CREATE INDEX IF NOT EXISTS idx_events_camera_time ON events (camera_id, triggered_at);
  CREATE INDEX IF NOT EXISTS idx_events_status ON events (status);
  CREATE INDEX IF NOT EXISTS idx_verdicts_event ON verdicts (event_id, version);
  CREATE INDEX IF NOT EXISTS idx_feedback_camera_type ON feedback_signals (camera_id, anomaly_type);
`;

type CameraRow = {
  id: string;
  name: string;
  width: number;
  height: number;
  profile: string | null;
  active_model_id: string | null;
  threshold: number | null;
  created_at: number;
};

type SnapshotRow = {
  id: string;
  camera_id: string;
  label: SnapshotLabel;
  captured_at: number;
  conditions: string | null;
  content_key: string;
  size_bytes: number;
  created_at: number;
};

type DatasetRow = {
  id: string;
  camera_id: string;
  version: number;
  status: DatasetStatus;
  supersedes: string | null;
  created_at: number;
  closed_at: number | null;
};

type JobRow = {
  id: string;
  camera_id: string;
  dataset_id: string;
  hyperparameters: string;
  status: TrainingJobStatus;
  progress: string;
  model_version_id: string | null;
  failure_code: ErrorCode | null;
  failure_reason: string | null;
  created_at: number;
  started_at: number | null;
  finished_at: number | null;
};

type ModelRow = {
  id: string;
  camera_id: string;
  training_job_id: string | null;
  dataset_id: string | null;
  version: number;
  artifact_key: string;
  checksum: string;
  format: ModelFormat;
  size_bytes: number;
  preprocessing: string;
  threshold: number;
  validation_error: number;
  training_stats: string | null;
  holdout_keys: string;
  state: ModelState;
  state_history: string;
  created_at: number;
  updated_at: number;
  deployed_at: number | null;
};

type BaselineRow = {
  id: string;
  camera_id: string;
  version: number;
  dataset_id: string;
  snapshot_count: number;
  grid_size: number;
  profiles: string;
  created_at: number;
};

type EventRow = {
  id: string;
  camera_id: string;
  triggered_at: number;
  model_version_id: string | null;
  reconstruction_error: number;
  threshold: number;
  frame_keys: string;
  frame_timestamps: string;
  trigger_frame_index: number;
  clip_key: string | null;
  clip_coverage_ms: number;
  status: EventStatus;
  degraded: number;
  shed: number;
  detection: string | null;
  verdict_id: string | null;
  received_at: number;
  analyzed_at: number | null;
};

type VerdictRow = {
  id: string;
  event_id: string;
  camera_id: string;
  version: number;
  anomaly_type: AnomalyType;
  risk_level: RiskLevel;
  score: number;
  confidence: number;
  explanation: string;
  correlated_event_ids: string;
  evidence: string;
  degraded: number;
  created_at: number;
};

type FeedbackRow = {
  id: string;
  verdict_id: string;
  event_id: string;
  camera_id: string;
  anomaly_type: AnomalyType;
  kind: FeedbackKind;
  created_at: number;
};

type FlagRow = {
  id: number;
  event_id: string;
  frame_key: string;
  reason: FeedbackKind;
  created_at: number;
};

export type CorrelationCandidate = {
  eventId: string;
  triggeredAt: number;
  correlatedEventIds: string[];
};

export type ListEventsOptions = {
  cameraId?: string;
  status?: EventStatus;
  since?: number;
  until?: number;
  limit?: number;
};

export type FeedbackTally = Record<FeedbackKind, number>;

export type VacuumOptions = {
  mode?: 'auto' | 'full';
  analyze?: boolean;
  reindex?: boolean;
  optimize?: boolean;
};

export type VacuumResult = {
  mode: 'auto' | 'full';
  pagesBefore: number;
  pagesAfter: number;
};

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);
  const current = Number(db.pragma('user_version', { simple: true }));
  if (!Number.isFinite(current) || current < SCHEMA_VERSION) {
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  }
  return db;
}

export class SentinelStore {
  readonly db: Database.Database;

  constructor(db: Database.Database | string = ':memory:') {
    this.db = typeof db === 'string' ? openDatabase(db) : db;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  schemaVersion(): number {
    return Number(this.db.pragma('user_version', { simple: true }));
  }

  vacuum(options: VacuumOptions = {}): VacuumResult {
    const mode = options.mode ?? 'auto';
    const pagesBefore = Number(this.db.pragma('page_count', { simple: true }));
    if (mode === 'full' && this.db.name !== ':memory:') {
      this.db.exec('PRAGMA wal_checkpoint(TRUNCATE)');
    }
    if (options.reindex) {
      this.db.exec('REINDEX');
    }
    if (options.analyze) {
      this.db.exec('ANALYZE');
    }
    this.db.exec('VACUUM');
    if (options.optimize) {
      this.db.exec('PRAGMA optimize');
    }
    const pagesAfter = Number(this.db.pragma('page_count', { simple: true }));
    return { mode, pagesBefore, pagesAfter };
  }

  close() {
    if (this.db.open) {
      this.db.close();
    }
  }

  upsertCamera(camera: Camera) {
    this.db
      .prepare(
        `INSERT INTO cameras (id, name, width, height, profile, active_model_id, threshold, created_at)
         VALUES (@id, @name, @width, @height, @profile, @activeModelId, @threshold, @createdAt)
         ON CONFLICT(id) DO UPDATE SET name = excluded.name, width = excluded.width,
           height = excluded.height, profile = excluded.profile`
      )
      .run({
        id: camera.id,
        name: camera.name,
        width: camera.resolution.width,
        height: camera.resolution.height,
        profile: camera.profile,
        activeModelId: camera.activeModelId,
        threshold: camera.threshold,
        createdAt: camera.createdAt
      });
  }

  getCamera(id: string): Camera | null {
    const row = this.db.prepare<[string], CameraRow>('SELECT * FROM cameras WHERE id = ?').get(id);
    return row ? mapCamera(row) : null;
  }

  listCameras(): Camera[] {
    return this.db.prepare<[], CameraRow>('SELECT * FROM cameras ORDER BY id').all().map(mapCamera);
  }

  setCameraActiveModel(cameraId: string, modelId: string | null, threshold: number | null) {
    this.db
      .prepare('UPDATE cameras SET active_model_id = ?, threshold = ? WHERE id = ?')
      .run(modelId, threshold, cameraId);
  }

  insertSnapshot(snapshot: LabeledSnapshot) {
    this.db
      .prepare(
        `INSERT INTO snapshots (id, camera_id, label, captured_at, conditions, content_key, size_bytes, created_at)
         VALUES (@id, @cameraId, @label, @capturedAt, @conditions, @contentKey, @sizeBytes, @createdAt)`
      )
      .run(snapshot);
  }

  getSnapshot(id: string): LabeledSnapshot | null {
    const row = this.db.prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE id = ?').get(id);
    return row ? mapSnapshot(row) : null;
  }

  listDatasetSnapshots(datasetId: string, label?: SnapshotLabel): LabeledSnapshot[] {
    const rows = label
      ? this.db
          .prepare<[string, string], SnapshotRow>(
            `SELECT s.* FROM snapshots s JOIN dataset_snapshots ds ON ds.snapshot_id = s.id
             WHERE ds.dataset_id = ? AND s.label = ? ORDER BY s.captured_at, s.id`
          )
          .all(datasetId, label)
      : this.db
          .prepare<[string], SnapshotRow>(
            `SELECT s.* FROM snapshots s JOIN dataset_snapshots ds ON ds.snapshot_id = s.id
             WHERE ds.dataset_id = ? ORDER BY s.captured_at, s.id`
          )
          .all(datasetId);
    return rows.map(mapSnapshot);
  }

  insertDataset(dataset: { id: string; cameraId: string; version: number; supersedes: string | null; createdAt: number }) {
    this.db
      .prepare(
        `INSERT INTO datasets (id, camera_id, version, status, supersedes, created_at, closed_at)
         VALUES (@id, @cameraId, @version, 'open', @supersedes, @createdAt, NULL)`
      )
      .run(dataset);
  }

  getDataset(id: string): Dataset | null {
    const row = this.db.prepare<[string], DatasetRow>('SELECT * FROM datasets WHERE id = ?').get(id);
    return row ? this.hydrateDataset(row) : null;
  }

  listDatasets(cameraId: string): Dataset[] {
    return this.db
      .prepare<[string], DatasetRow>('SELECT * FROM datasets WHERE camera_id = ? ORDER BY version')
      .all(cameraId)
      .map(row => this.hydrateDataset(row));
  }

  findDataset(cameraId: string, status: DatasetStatus): Dataset | null {
    const row = this.db
      .prepare<[string, string], DatasetRow>(
        'SELECT * FROM datasets WHERE camera_id = ? AND status = ? ORDER BY version DESC LIMIT 1'
      )
      .get(cameraId, status);
    return row ? this.hydrateDataset(row) : null;
  }

  nextDatasetVersion(cameraId: string): number {
    const row = this.db
      .prepare<[string], { version: number | null }>('SELECT MAX(version) AS version FROM datasets WHERE camera_id = ?')
      .get(cameraId);
    return (row?.version ?? 0) + 1;
  }

  updateDatasetStatus(id: string, status: DatasetStatus, closedAt?: number) {
    if (closedAt === undefined) {
      this.db.prepare('UPDATE datasets SET status = ? WHERE id = ?').run(status, id);
      return;
    }
    this.db.prepare('UPDATE datasets SET status = ?, closed_at = ? WHERE id = ?').run(status, closedAt, id);
  }

  linkSnapshot(datasetId: string, snapshotId: string) {
    this.db
      .prepare('INSERT OR IGNORE INTO dataset_snapshots (dataset_id, snapshot_id) VALUES (?, ?)')
      .run(datasetId, snapshotId);
  }

  copyDatasetLinks(fromDatasetId: string, toDatasetId: string) {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO dataset_snapshots (dataset_id, snapshot_id)
         SELECT ?, snapshot_id FROM dataset_snapshots WHERE dataset_id = ?`
      )
      .run(toDatasetId, fromDatasetId);
  }

  insertJob(job: TrainingJob) {
    this.db
      .prepare(
        `INSERT INTO training_jobs (id, camera_id, dataset_id, hyperparameters, status, progress, model_version_id,
           failure_code, failure_reason, created_at, started_at, finished_at)
         VALUES (@id, @cameraId, @datasetId, @hyperparameters, @status, @progress, @modelVersionId,
           @failureCode, @failureReason, @createdAt, @startedAt, @finishedAt)`
      )
      .run(jobParams(job));
  }

  updateJob(job: TrainingJob) {
    this.db
      .prepare(
        `UPDATE training_jobs SET status = @status, progress = @progress, model_version_id = @modelVersionId,
           failure_code = @failureCode, failure_reason = @failureReason, started_at = @startedAt,
           finished_at = @finishedAt
         WHERE id = @id`
      )
      .run(jobParams(job));
  }

  getJob(id: string): TrainingJob | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM training_jobs WHERE id = ?').get(id);
    return row ? mapJob(row) : null;
  }

  listJobs(cameraId: string): TrainingJob[] {
    return this.db
      .prepare<[string], JobRow>('SELECT * FROM training_jobs WHERE camera_id = ? ORDER BY created_at, id')
      .all(cameraId)
      .map(mapJob);
  }

  listJobsByStatus(statuses: TrainingJobStatus[]): TrainingJob[] {
    const placeholders = statuses.map(() => '?').join(', ');
    return this.db
      .prepare<string[], JobRow>(`SELECT * FROM training_jobs WHERE status IN (${placeholders}) ORDER BY created_at`)
      .all(...statuses)
      .map(mapJob);
  }

  findActiveJob(cameraId: string): TrainingJob | null {
    const row = this.db
      .prepare<[string], JobRow>(
        "SELECT * FROM training_jobs WHERE camera_id = ? AND status IN ('queued', 'running') LIMIT 1"
      )
      .get(cameraId);
    return row ? mapJob(row) : null;
  }

  findTerminalJobForDataset(datasetId: string): TrainingJob | null {
    const row = this.db
      .prepare<[string], JobRow>(
        "SELECT * FROM training_jobs WHERE dataset_id = ? AND status IN ('succeeded', 'failed') LIMIT 1"
      )
      .get(datasetId);
    return row ? mapJob(row) : null;
  }

  insertModel(model: ModelVersion) {
    this.db
      .prepare(
        `INSERT INTO model_versions (id, camera_id, training_job_id, dataset_id, version, artifact_key, checksum, format,
           size_bytes, preprocessing, threshold, validation_error, training_stats, holdout_keys, state, state_history,
           created_at, updated_at, deployed_at)
         VALUES (@id, @cameraId, @trainingJobId, @datasetId, @version, @artifactKey, @checksum, @format,
           @sizeBytes, @preprocessing, @threshold, @validationError, @trainingStats, @holdoutKeys, @state, @stateHistory,
           @createdAt, @updatedAt, @deployedAt)`
      )
      .run(modelParams(model));
  }

  updateModelState(model: ModelVersion) {
    this.db
      .prepare(
        `UPDATE model_versions SET state = @state, state_history = @stateHistory, updated_at = @updatedAt,
           deployed_at = @deployedAt
         WHERE id = @id`
      )
      .run(modelParams(model));
  }

  getModel(id: string): ModelVersion | null {
    const row = this.db.prepare<[string], ModelRow>('SELECT * FROM model_versions WHERE id = ?').get(id);
    return row ? mapModel(row) : null;
  }

  listModels(cameraId?: string): ModelVersion[] {
    const rows = cameraId
      ? this.db
          .prepare<[string], ModelRow>('SELECT * FROM model_versions WHERE camera_id = ? ORDER BY version')
          .all(cameraId)
      : this.db.prepare<[], ModelRow>('SELECT * FROM model_versions ORDER BY camera_id, version').all();
    return rows.map(mapModel);
  }

  findModelsByState(cameraId: string, state: ModelState): ModelVersion[] {
    return this.db
      .prepare<[string, string], ModelRow>(
        'SELECT * FROM model_versions WHERE camera_id = ? AND state = ? ORDER BY version DESC'
      )
      .all(cameraId, state)
      .map(mapModel);
  }

  nextModelVersion(cameraId: string): number {
    const row = this.db
      .prepare<[string], { version: number | null }>(
        'SELECT MAX(version) AS version FROM model_versions WHERE camera_id = ?'
      )
      .get(cameraId);
    return (row?.version ?? 0) + 1;
  }

  insertBaseline(baseline: BaselineInventory) {
    this.db
      .prepare(
        `INSERT INTO baseline_inventories (id, camera_id, version, dataset_id, snapshot_count, grid_size, profiles, created_at)
         VALUES (@id, @cameraId, @version, @datasetId, @snapshotCount, @gridSize, @profiles, @createdAt)`
      )
      .run({ ...baseline, profiles: JSON.stringify(baseline.profiles) });
  }

  latestBaseline(cameraId: string): BaselineInventory | null {
    const row = this.db
      .prepare<[string], BaselineRow>(
        'SELECT * FROM baseline_inventories WHERE camera_id = ? ORDER BY version DESC LIMIT 1'
      )
      .get(cameraId);
    return row ? mapBaseline(row) : null;
  }

  nextBaselineVersion(cameraId: string): number {
    const row = this.db
      .prepare<[string], { version: number | null }>(
        'SELECT MAX(version) AS version FROM baseline_inventories WHERE camera_id = ?'
      )
      .get(cameraId);
    return (row?.version ?? 0) + 1;
  }

  insertEvent(event: SentinelEvent): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO events (id, camera_id, triggered_at, model_version_id, reconstruction_error, threshold,
           frame_keys, frame_timestamps, trigger_frame_index, clip_key, clip_coverage_ms, status, degraded, shed,
           detection, verdict_id, received_at, analyzed_at)
         VALUES (@id, @cameraId, @triggeredAt, @modelVersionId, @reconstructionError, @threshold,
           @frameKeys, @frameTimestamps, @triggerFrameIndex, @clipKey, @clipCoverageMs, @status, @degraded, @shed,
           @detection, @verdictId, @receivedAt, @analyzedAt)`
      )
      .run(eventParams(event));
    return result.changes > 0;
  }

  updateEvent(event: SentinelEvent) {
    this.db
      .prepare(
        `UPDATE events SET status = @status, degraded = @degraded, shed = @shed, detection = @detection,
           verdict_id = @verdictId, analyzed_at = @analyzedAt
         WHERE id = @id`
      )
      .run(eventParams(event));
  }

  getEvent(id: string): SentinelEvent | null {
    const row = this.db.prepare<[string], EventRow>('SELECT * FROM events WHERE id = ?').get(id);
    return row ? mapEvent(row) : null;
  }

  listEvents(options: ListEventsOptions = {}): SentinelEvent[] {
    const clauses: string[] = [];
    const params: Record<string, string | number> = {};
    if (options.cameraId) {
      clauses.push('camera_id = @cameraId');
      params.cameraId = options.cameraId;
    }
    if (options.status) {
      clauses.push('status = @status');
      params.status = options.status;
    }
    if (typeof options.since === 'number') {
      clauses.push('triggered_at >= @since');
      params.since = options.since;
    }
    if (typeof options.until === 'number') {
      clauses.push('triggered_at <= @until');
      params.until = options.until;
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.limit = clampLimit(options.limit);
    return this.db
      .prepare<Record<string, string | number>, EventRow>(
        `SELECT * FROM events ${where} ORDER BY triggered_at DESC, id LIMIT @limit`
      )
      .all(params)
      .map(mapEvent);
  }

  listPendingEvents(): SentinelEvent[] {
    return this.db
      .prepare<[], EventRow>(
        "SELECT * FROM events WHERE status IN ('received', 'analyzing') ORDER BY received_at, id"
      )
      .all()
      .map(mapEvent);
  }

  hasRecentPendingEvent(cameraId: string, since: number, excludeId: string): boolean {
    const row = this.db
      .prepare<[string, number, string], { id: string }>(
        "SELECT id FROM events WHERE camera_id = ? AND status = 'received' AND triggered_at >= ? AND id != ? LIMIT 1"
      )
      .get(cameraId, since, excludeId);
    return Boolean(row);
  }

  insertVerdict(verdict: AnomalyVerdict) {
    this.db
      .prepare(
        `INSERT INTO verdicts (id, event_id, camera_id, version, anomaly_type, risk_level, score, confidence, explanation,
           correlated_event_ids, evidence, degraded, created_at)
         VALUES (@id, @eventId, @cameraId, @version, @anomalyType, @riskLevel, @score, @confidence, @explanation,
           @correlatedEventIds, @evidence, @degraded, @createdAt)`
      )
      .run({
        ...verdict,
        correlatedEventIds: JSON.stringify(verdict.correlatedEventIds),
        evidence: JSON.stringify(verdict.evidence),
        degraded: verdict.degraded ? 1 : 0
      });
  }

  getVerdict(id: string): AnomalyVerdict | null {
    const row = this.db.prepare<[string], VerdictRow>('SELECT * FROM verdicts WHERE id = ?').get(id);
    return row ? mapVerdict(row) : null;
  }

  listVerdictsForEvent(eventId: string): AnomalyVerdict[] {
    return this.db
      .prepare<[string], VerdictRow>('SELECT * FROM verdicts WHERE event_id = ? ORDER BY version')
      .all(eventId)
      .map(mapVerdict);
  }

  nextVerdictVersion(eventId: string): number {
    const row = this.db
      .prepare<[string], { version: number | null }>('SELECT MAX(version) AS version FROM verdicts WHERE event_id = ?')
      .get(eventId);
    return (row?.version ?? 0) + 1;
  }

  findCorrelationCandidates(
    cameraId: string,
    anomalyType: AnomalyType,
    since: number,
    until: number,
    excludeEventId: string
  ): CorrelationCandidate[] {
    const rows = this.db
      .prepare<[string, string, number, number, string], { event_id: string; triggered_at: number; correlated_event_ids: string }>(
        `SELECT v.event_id, e.triggered_at, v.correlated_event_ids
         FROM events e JOIN verdicts v ON v.id = e.verdict_id
         WHERE e.camera_id = ? AND v.anomaly_type = ? AND e.triggered_at >= ? AND e.triggered_at <= ? AND e.id != ?
         ORDER BY e.triggered_at`
      )
      .all(cameraId, anomalyType, since, until, excludeEventId);
    return rows.map(row => ({
      eventId: row.event_id,
      triggeredAt: row.triggered_at,
      correlatedEventIds: parseJson<string[]>(row.correlated_event_ids, [])
    }));
  }

  insertFeedback(signal: FeedbackSignal) {
    this.db
      .prepare(
        `INSERT INTO feedback_signals (id, verdict_id, event_id, camera_id, anomaly_type, kind, created_at)
         VALUES (@id, @verdictId, @eventId, @cameraId, @anomalyType, @kind, @createdAt)`
      )
      .run(signal);
  }

  listFeedback(cameraId: string): FeedbackSignal[] {
    return this.db
      .prepare<[string], FeedbackRow>('SELECT * FROM feedback_signals WHERE camera_id = ? ORDER BY created_at, id')
      .all(cameraId)
      .map(mapFeedback);
  }

  tallyFeedback(cameraId: string, anomalyType: AnomalyType): FeedbackTally {
    const rows = this.db
      .prepare<[string, string], { kind: FeedbackKind; total: number }>(
        'SELECT kind, COUNT(*) AS total FROM feedback_signals WHERE camera_id = ? AND anomaly_type = ? GROUP BY kind'
      )
      .all(cameraId, anomalyType);
    const tally: FeedbackTally = { false_positive: 0, confirmed_threat: 0 };
    for (const row of rows) {
      tally[row.kind] = row.total;
    }
    return tally;
  }

  insertSnapshotFlag(flag: Omit<SnapshotFlag, 'id'>) {
    this.db
      .prepare(
        'INSERT INTO snapshot_flags (event_id, frame_key, reason, created_at) VALUES (@eventId, @frameKey, @reason, @createdAt)'
      )
      .run(flag);
  }

  listSnapshotFlags(eventId?: string): SnapshotFlag[] {
    const rows = eventId
      ? this.db.prepare<[string], FlagRow>('SELECT * FROM snapshot_flags WHERE event_id = ? ORDER BY id').all(eventId)
      : this.db.prepare<[], FlagRow>('SELECT * FROM snapshot_flags ORDER BY id').all();
    return rows.map(row => ({
      id: row.id,
      eventId: row.event_id,
      frameKey: row.frame_key,
      reason: row.reason,
      createdAt: row.created_at
    }));
  }

  private hydrateDataset(row: DatasetRow): Dataset {
    const counts = this.db
      .prepare<[string], { label: SnapshotLabel; total: number; bytes: number }>(
        `SELECT s.label AS label, COUNT(*) AS total, SUM(s.size_bytes) AS bytes
         FROM dataset_snapshots ds JOIN snapshots s ON s.id = ds.snapshot_id
         WHERE ds.dataset_id = ? GROUP BY s.label`
      )
      .all(row.id);
    const labelCounts: LabelCounts = { normal: 0, threat: 0, abnormal: 0, custom: 0 };
    let snapshotCount = 0;
    let totalBytes = 0;
    for (const entry of counts) {
      labelCounts[entry.label] = entry.total;
      snapshotCount += entry.total;
      totalBytes += entry.bytes;
    }
    return {
      id: row.id,
      cameraId: row.camera_id,
      version: row.version,
      status: row.status,
      supersedes: row.supersedes,
      labelCounts,
      snapshotCount,
      totalBytes,
      createdAt: row.created_at,
      closedAt: row.closed_at
    };
  }
}

function parseJson<T>(raw: string | null, fallback: T): T {
  if (!raw) {
    return fallback;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return fallback;
  }
}

function parseRequiredJson<T>(raw: string): T {
  return JSON.parse(raw);
}

function clampLimit(limit?: number) {
  if (typeof limit !== 'number' || !Number.isFinite(limit)) {
    return 100;
  }
  return Math.min(1000, Math.max(1, Math.floor(limit)));
}

function mapCamera(row: CameraRow): Camera {
  return {
    id: row.id,
    name: row.name,
    resolution: { width: row.width, height: row.height },
    profile: row.profile,
    activeModelId: row.active_model_id,
    threshold: row.threshold,
    createdAt: row.created_at
  };
}

function mapSnapshot(row: SnapshotRow): LabeledSnapshot {
  return {
    id: row.id,
    cameraId: row.camera_id,
    label: row.label,
    capturedAt: row.captured_at,
    conditions: row.conditions,
    contentKey: row.content_key,
    sizeBytes: row.size_bytes,
    createdAt: row.created_at
  };
}

function jobParams(job: TrainingJob) {
  return {
    id: job.id,
    cameraId: job.cameraId,
    datasetId: job.datasetId,
    hyperparameters: JSON.stringify(job.hyperparameters),
    status: job.status,
    progress: JSON.stringify(job.progress),
    modelVersionId: job.modelVersionId,
    failureCode: job.failure?.code ?? null,
    failureReason: job.failure?.reason ?? null,
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt
  };
}

function mapJob(row: JobRow): TrainingJob {
  return {
    id: row.id,
    cameraId: row.camera_id,
    datasetId: row.dataset_id,
    hyperparameters: parseRequiredJson<TrainingHyperparameters>(row.hyperparameters),
    status: row.status,
    progress: parseJson<TrainingProgress>(row.progress, { epoch: 0, loss: null, validationError: null, bestValidationError: null }),
    modelVersionId: row.model_version_id,
    failure: row.failure_code ? { code: row.failure_code, reason: row.failure_reason ?? '' } : null,
    createdAt: row.created_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at
  };
}

function modelParams(model: ModelVersion) {
  return {
    id: model.id,
    cameraId: model.cameraId,
    trainingJobId: model.trainingJobId,
    datasetId: model.datasetId,
    version: model.version,
    artifactKey: model.artifactKey,
    checksum: model.checksum,
    format: model.format,
    sizeBytes: model.sizeBytes,
    preprocessing: JSON.stringify(model.preprocessing),
    threshold: model.threshold,
    validationError: model.validationError,
    trainingStats: model.trainingStats ? JSON.stringify(model.trainingStats) : null,
    holdoutKeys: JSON.stringify(model.holdoutKeys),
    state: model.state,
    stateHistory: JSON.stringify(model.stateHistory),
    createdAt: model.createdAt,
    updatedAt: model.updatedAt,
    deployedAt: model.deployedAt
  };
}

function mapModel(row: ModelRow): ModelVersion {
  return {
    id: row.id,
    cameraId: row.camera_id,
    trainingJobId: row.training_job_id,
    datasetId: row.dataset_id,
    version: row.version,
    artifactKey: row.artifact_key,
    checksum: row.checksum,
    format: row.format,
    sizeBytes: row.size_bytes,
    preprocessing: parseRequiredJson<PreprocessingParams>(row.preprocessing),
    threshold: row.threshold,
    validationError: row.validation_error,
    trainingStats: parseJson<TrainingStats | null>(row.training_stats, null),
    holdoutKeys: parseJson<string[]>(row.holdout_keys, []),
    state: row.state,
    stateHistory: parseJson<ModelStateChange[]>(row.state_history, []),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deployedAt: row.deployed_at
  };
}

function mapBaseline(row: BaselineRow): BaselineInventory {
  return {
    id: row.id,
    cameraId: row.camera_id,
    version: row.version,
    datasetId: row.dataset_id,
    snapshotCount: row.snapshot_count,
    gridSize: row.grid_size,
    profiles: parseJson<ObjectProfile[]>(row.profiles, []),
    createdAt: row.created_at
  };
}

function eventParams(event: SentinelEvent) {
  return {
    id: event.id,
    cameraId: event.cameraId,
    triggeredAt: event.triggeredAt,
    modelVersionId: event.modelVersionId,
    reconstructionError: event.reconstructionError,
    threshold: event.threshold,
    frameKeys: JSON.stringify(event.frameKeys),
    frameTimestamps: JSON.stringify(event.frameTimestamps),
    triggerFrameIndex: event.triggerFrameIndex,
    clipKey: event.clipKey,
    clipCoverageMs: event.clipCoverageMs,
    status: event.status,
    degraded: event.degraded ? 1 : 0,
    shed: event.shed ? 1 : 0,
    detection: event.detection ? JSON.stringify(event.detection) : null,
    verdictId: event.verdictId,
    receivedAt: event.receivedAt,
    analyzedAt: event.analyzedAt
  };
}

function mapEvent(row: EventRow): SentinelEvent {
  return {
    id: row.id,
    cameraId: row.camera_id,
    triggeredAt: row.triggered_at,
    modelVersionId: row.model_version_id,
    reconstructionError: row.reconstruction_error,
    threshold: row.threshold,
    frameKeys: parseJson<string[]>(row.frame_keys, []),
    frameTimestamps: parseJson<number[]>(row.frame_timestamps, []),
    triggerFrameIndex: row.trigger_frame_index,
    clipKey: row.clip_key,
    clipCoverageMs: row.clip_coverage_ms,
    status: row.status,
    degraded: row.degraded === 1,
    shed: row.shed === 1,
    detection: parseJson<DetectionResult | null>(row.detection, null),
    verdictId: row.verdict_id,
    receivedAt: row.received_at,
    analyzedAt: row.analyzed_at
  };
}

function mapVerdict(row: VerdictRow): AnomalyVerdict {
  return {
    id: row.id,
    eventId: row.event_id,
    cameraId: row.camera_id,
    version: row.version,
    anomalyType: row.anomaly_type,
    riskLevel: row.risk_level,
    score: row.score,
    confidence: row.confidence,
    explanation: row.explanation,
    correlatedEventIds: parseJson<string[]>(row.correlated_event_ids, []),
    evidence: parseRequiredJson<VerdictEvidence>(row.evidence),
    degraded: row.degraded === 1,
    createdAt: row.created_at
  };
}

function mapFeedback(row: FeedbackRow): FeedbackSignal {
  return {
    id: row.id,
    verdictId: row.verdict_id,
    eventId: row.event_id,
    cameraId: row.camera_id,
    anomalyType: row.anomaly_type,
    kind: row.kind,
    createdAt: row.created_at
  };
}
