import type { ReasoningConfig } from '../config/index.js';
import type { SentinelStore } from '../db.js';
import logger, { type Logger } from '../logger.js';
import type {
  AnomalyType,
  BaselineInventory,
  DetectedObject,
  DetectionResult,
  ObjectProfile,
  SentinelEvent,
  VerdictDraft,
  VerdictEvidence
} from '../types.js';
import { frequencyAt, gridCell, minuteOfDay, windowContains } from './timeWindows.js';

const DEFAULT_EXPECTED_FREQUENCY = 0.8;
const DEFAULT_DWELL_THRESHOLD_MS = 30_000;
const EDGE_ONLY_CONFIDENCE_CAP = 0.5;

/** Detections of one class across the clip. */
type ClassSighting = {
  objectClass: string;
  confidence: number;
  maxCount: number;
  frames: Set<number>;
  cells: number[];
};

type Finding = {
  anomalyType: AnomalyType;
  confidence: number;
  evidence: Partial<VerdictEvidence>;
};

interface ReasoningEngineDependencies {
  store: SentinelStore;
  config: ReasoningConfig;
  log?: Logger;
}

export class ReasoningEngine {
  private readonly store: SentinelStore;
  private readonly config: ReasoningConfig;
  private readonly log: Logger;

  constructor(dependencies: ReasoningEngineDependencies) {
    this.store = dependencies.store;
    this.config = dependencies.config;
    this.log = (dependencies.log ?? logger).child({ component: 'reasoning' });
  }

  reason(event: SentinelEvent, detection: DetectionResult, baseline: BaselineInventory | null): VerdictDraft {
    const minute = minuteOfDay(event.triggeredAt, this.config.timezoneOffsetMinutes ?? 0);
    const finding = baseline && !detection.degraded ? this.classify(event, detection, baseline, minute) : null;
    const resolved = finding ?? edgeOnlyFinding(event);
    const correlatedEventIds = this.correlate(event, resolved.anomalyType);
    this.log.debug(
      { eventId: event.id, anomalyType: resolved.anomalyType, group: correlatedEventIds.length },
      'Event classified'
    );
    return this.draft(event, resolved, minute, baseline, correlatedEventIds, detection.degraded || event.degraded);
  }

  /** Uncorrelated, degraded verdict from the edge trigger alone. */
  edgeOnly(event: SentinelEvent): VerdictDraft {
    const minute = minuteOfDay(event.triggeredAt, this.config.timezoneOffsetMinutes ?? 0);
    return this.draft(event, edgeOnlyFinding(event), minute, null, [event.id], true);
  }

  private draft(
    event: SentinelEvent,
    resolved: Finding,
    minute: number,
    baseline: BaselineInventory | null,
    correlatedEventIds: string[],
    degraded: boolean
  ): VerdictDraft {
    const evidence: VerdictEvidence = {
      objectClass: null,
      observedCount: null,
      expectedRange: null,
      expectedFrequency: null,
      minuteOfDay: minute,
      baselineWindows: [],
      observedCells: [],
      dwellMs: null,
      clipCoverageMs: event.clipCoverageMs,
      reconstructionError: event.reconstructionError,
      threshold: event.threshold,
      baselineVersion: baseline?.version ?? null,
      ...resolved.evidence
    };
    return {
      eventId: event.id,
      cameraId: event.cameraId,
      anomalyType: resolved.anomalyType,
      confidence: clampUnit(resolved.confidence),
      evidence,
      correlatedEventIds,
      degraded
    };
  }

  /** Members of the correlation group, the event itself included. */
  correlate(event: SentinelEvent, anomalyType: AnomalyType): string[] {
    const window = this.config.correlationWindowMs;
    const candidates = this.store.findCorrelationCandidates(
      event.cameraId,
      anomalyType,
      event.triggeredAt - window,
      event.triggeredAt + window,
      event.id
    );
    const members = new Set<string>([event.id]);
    for (const candidate of candidates) {
      members.add(candidate.eventId);
      for (const id of candidate.correlatedEventIds) {
        members.add(id);
      }
    }
    return [...members].sort();
  }

  private classify(
    event: SentinelEvent,
    detection: DetectionResult,
    baseline: BaselineInventory,
    minute: number
  ): Finding | null {
    const sightings = summarize(detection.objects, baseline.gridSize);
    const profiles = new Map(baseline.profiles.map(profile => [profile.objectClass, profile]));

    const unknown = strongest(sightings.filter(sighting => !profiles.has(sighting.objectClass)));
    if (unknown) {
      return {
        anomalyType: 'new_object',
        confidence: unknown.confidence,
        evidence: { objectClass: unknown.objectClass, observedCount: unknown.maxCount, observedCells: unknown.cells }
      };
    }

    const missing = this.findMissing(event, sightings, baseline.profiles, minute);
    if (missing) {
      return {
        anomalyType: 'missing_object',
        confidence: missing.frequency,
        evidence: {
          objectClass: missing.profile.objectClass,
          observedCount: 0,
          expectedRange: missing.profile.typicalCountRange,
          expectedFrequency: missing.frequency,
          baselineWindows: missing.profile.typicalTimeWindows
        }
      };
    }

    const known = sightings.flatMap(sighting => {
      const profile = profiles.get(sighting.objectClass);
      return profile ? [{ sighting, profile }] : [];
    });

    const countAnomaly = strongestPair(known.filter(({ sighting, profile }) => this.countDeviates(sighting, profile)));
    if (countAnomaly) {
      return findingFor('abnormal_count', countAnomaly.sighting, countAnomaly.profile);
    }

    const offHours = strongestPair(
      known.filter(({ profile }) => !profile.typicalTimeWindows.some(window => windowContains(window, minute)))
    );
    if (offHours) {
      return findingFor('abnormal_time', offHours.sighting, offHours.profile);
    }

    const tracked = known.filter(({ sighting }) => sighting.frames.size > 1);
    const offPath = strongestPair(
      tracked.filter(({ sighting, profile }) => sighting.cells.some(cell => !profile.typicalPositions.includes(cell)))
    );
    if (offPath) {
      return findingFor('unusual_path', offPath.sighting, offPath.profile);
    }

    const dwellThreshold = this.config.dwellThresholdMs ?? DEFAULT_DWELL_THRESHOLD_MS;
    const lingering = strongestPair(
      tracked.filter(
        ({ sighting }) =>
          sighting.frames.size === detection.framesAnalyzed && event.clipCoverageMs > dwellThreshold
      )
    );
    if (lingering) {
      const finding = findingFor('unusual_dwell', lingering.sighting, lingering.profile);
      return { ...finding, evidence: { ...finding.evidence, dwellMs: event.clipCoverageMs } };
    }

    return null;
  }

  private findMissing(
    event: SentinelEvent,
    sightings: ClassSighting[],
    profiles: ObjectProfile[],
    minute: number
  ): { profile: ObjectProfile; frequency: number } | null {
    if (event.clipCoverageMs < this.config.minClipCoverageMs) {
      return null;
    }
    const seen = new Set(sightings.map(sighting => sighting.objectClass));
    const expectedFrequency = this.config.expectedFrequency ?? DEFAULT_EXPECTED_FREQUENCY;
    const expected = profiles
      .filter(profile => !seen.has(profile.objectClass))
      .map(profile => ({ profile, frequency: frequencyAt(profile.windowFrequencies, minute) }))
      .filter(candidate => candidate.frequency >= expectedFrequency)
      .sort((a, b) => b.frequency - a.frequency || a.profile.objectClass.localeCompare(b.profile.objectClass));
    return expected[0] ?? null;
  }

  private countDeviates(sighting: ClassSighting, profile: ObjectProfile) {
    const [low, high] = profile.typicalCountRange;
    const multiple = this.config.countMultiple;
    return sighting.maxCount > high * multiple || sighting.maxCount < low / multiple;
  }
}

function summarize(objects: DetectedObject[], gridSize: number): ClassSighting[] {
  const byClass = new Map<string, ClassSighting>();
  const perFrame = new Map<string, number>();
  for (const object of objects) {
    let sighting = byClass.get(object.objectClass);
    if (!sighting) {
      sighting = { objectClass: object.objectClass, confidence: 0, maxCount: 0, frames: new Set(), cells: [] };
      byClass.set(object.objectClass, sighting);
    }
    sighting.confidence = Math.max(sighting.confidence, object.confidence);
    sighting.frames.add(object.frameIndex);
    const cell = gridCell(object.bbox, gridSize);
    if (!sighting.cells.includes(cell)) {
      sighting.cells.push(cell);
    }
    const frameKey = `${object.objectClass}\u0000${object.frameIndex}`;
    const count = (perFrame.get(frameKey) ?? 0) + 1;
    perFrame.set(frameKey, count);
    sighting.maxCount = Math.max(sighting.maxCount, count);
  }
  for (const sighting of byClass.values()) {
    sighting.cells.sort((a, b) => a - b);
  }
  return [...byClass.values()];
}

function strongest(sightings: ClassSighting[]): ClassSighting | null {
  const sorted = [...sightings].sort(
    (a, b) => b.confidence - a.confidence || a.objectClass.localeCompare(b.objectClass)
  );
  return sorted[0] ?? null;
}

function strongestPair<T extends { sighting: ClassSighting }>(pairs: T[]): T | null {
  const sorted = [...pairs].sort(
    (a, b) => b.sighting.confidence - a.sighting.confidence || a.sighting.objectClass.localeCompare(b.sighting.objectClass)
  );
  return sorted[0] ?? null;
}

function findingFor(anomalyType: AnomalyType, sighting: ClassSighting, profile: ObjectProfile): Finding {
  return {
    anomalyType,
    confidence: sighting.confidence,
    evidence: {
      objectClass: sighting.objectClass,
      observedCount: sighting.maxCount,
      expectedRange: profile.typicalCountRange,
      expectedFrequency: profile.frequency,
      baselineWindows: profile.typicalTimeWindows,
      observedCells: sighting.cells
    }
  };
}

// Edge trigger without VM corroboration; confidence grows with the margin over threshold.
function edgeOnlyFinding(event: SentinelEvent): Finding {
  const margin = event.threshold > 0 ? event.reconstructionError / event.threshold - 1 : 0;
  return {
    anomalyType: 'none',
    confidence: Math.min(EDGE_ONLY_CONFIDENCE_CAP, Math.max(0, margin) * EDGE_ONLY_CONFIDENCE_CAP),
    evidence: {}
  };
}

function clampUnit(value: number) {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
