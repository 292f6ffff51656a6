import { randomUUID } from 'node:crypto';
import { DEFAULT_SCORING, type ScoringConfig } from '../config/index.js';
import type { SentinelStore } from '../db.js';
import type { AnomalyType, AnomalyVerdict, RiskLevel, VerdictDraft, VerdictEvidence } from '../types.js';
import { formatMinute, formatWindow, gapAround } from './timeWindows.js';

export const BASE_SCORES: Record<AnomalyType, number> = {
  new_object: 0.6,
  abnormal_time: 0.55,
  missing_object: 0.5,
  abnormal_count: 0.45,
  unusual_path: 0.4,
  unusual_dwell: 0.4,
  none: 0.2
};

const CONFIDENCE_WEIGHT = 0.3;
const GROUP_WEIGHT = 0.1;
const GROUP_SATURATION = 4;

interface RiskScorerDependencies {
  store: SentinelStore;
  config?: ScoringConfig;
  now?: () => number;
}

export class RiskScorer {
  private readonly store: SentinelStore;
  private readonly config: ScoringConfig;
  private readonly now: () => number;

  constructor(dependencies: RiskScorerDependencies) {
    this.store = dependencies.store;
    this.config = dependencies.config ?? DEFAULT_SCORING;
    this.now = dependencies.now ?? Date.now;
  }

  score(draft: VerdictDraft): AnomalyVerdict {
    const tally = this.store.tallyFeedback(draft.cameraId, draft.anomalyType);
    const bias = feedbackBias(tally.confirmed_threat, tally.false_positive, this.config.feedbackWeight ?? 0);
    const score = riskScore(draft.anomalyType, draft.confidence, draft.correlatedEventIds.length, bias);
    return {
      id: randomUUID(),
      eventId: draft.eventId,
      cameraId: draft.cameraId,
      version: this.store.nextVerdictVersion(draft.eventId),
      anomalyType: draft.anomalyType,
      riskLevel: this.level(score),
      score,
      confidence: draft.confidence,
      explanation: explain(draft),
      correlatedEventIds: draft.correlatedEventIds,
      evidence: draft.evidence,
      degraded: draft.degraded,
      createdAt: this.now()
    };
  }

  level(score: number): RiskLevel {
    if (score >= this.config.criticalAt) {
      return 'critical';
    }
    if (score >= this.config.warningAt) {
      return 'warning';
    }
    return 'normal';
  }
}

/** Non-decreasing in both confidence and group size. */
export function riskScore(anomalyType: AnomalyType, confidence: number, groupSize: number, bias = 0) {
  const boundedConfidence = Math.min(1, Math.max(0, confidence));
  const groupBoost = Math.min(1, Math.max(0, groupSize - 1) / GROUP_SATURATION);
  const raw = BASE_SCORES[anomalyType] + CONFIDENCE_WEIGHT * boundedConfidence + GROUP_WEIGHT * groupBoost + bias;
  return Math.min(1, Math.max(0, raw));
}

export function feedbackBias(confirmed: number, falsePositives: number, weight: number) {
  const total = confirmed + falsePositives;
  if (total === 0 || weight <= 0) {
    return 0;
  }
  return (weight * (confirmed - falsePositives)) / (total + 1);
}

export function explain(draft: VerdictDraft): string {
  const evidence = draft.evidence;
  const objectClass = evidence.objectClass ?? 'object';
  const at = formatMinute(evidence.minuteOfDay);
  let text: string;
  switch (draft.anomalyType) {
    case 'new_object':
      text = `${objectClass} present ${at}, never observed on this camera in baseline`;
      break;
    case 'missing_object':
      text = `${objectClass} absent ${at}, expected in ${percent(evidence.expectedFrequency)} of baseline snapshots`;
      break;
    case 'abnormal_count':
      text = `${evidence.observedCount ?? 0} ${objectClass} present ${at}, baseline typical ${formatRange(evidence)}`;
      break;
    case 'abnormal_time':
      text = `${objectClass} present ${at}, never observed on this camera ${formatWindows(evidence)} in baseline`;
      break;
    case 'unusual_path':
      text = `${objectClass} moved through grid cells ${evidence.observedCells.join(', ')} ${at}, outside baseline positions`;
      break;
    case 'unusual_dwell':
      text = `${objectClass} stayed ${Math.round((evidence.dwellMs ?? 0) / 1000)}s ${at}, longer than usual for this camera`;
      break;
    default:
      text = `edge anomaly ${at}, reconstruction error ${evidence.reconstructionError.toFixed(4)} over threshold ${evidence.threshold.toFixed(4)}, no object-level corroboration`;
  }
  const others = draft.correlatedEventIds.length - 1;
  if (others > 0) {
    text += ` (correlated with ${others} other event${others === 1 ? '' : 's'})`;
  }
  if (draft.degraded) {
    text += ' [degraded analysis]';
  }
  return text;
}

function formatWindows(evidence: VerdictEvidence) {
  const gap = gapAround(evidence.baselineWindows, evidence.minuteOfDay);
  return gap ? formatWindow(gap) : 'at this time';
}

function formatRange(evidence: VerdictEvidence) {
  if (!evidence.expectedRange) {
    return 'unknown';
  }
  const [low, high] = evidence.expectedRange;
  return low === high ? `${low}` : `${low}–${high}`;
}

function percent(value: number | null) {
  return `${Math.round((value ?? 0) * 100)}%`;
}
