/**
 * @fileoverview Types for the gap-driven acquisition loop.
 * @module variety-engine/acquisition/types
 */

import type { CandidateOrigin } from '../discovery/types.js';
import type { ProcessStatus } from '../process/types.js';

// ============================================================================
// GAPS
// ============================================================================

export type GapSeverity = 'low' | 'normal' | 'high' | 'critical';

export const GAP_SEVERITY_ORDER: Readonly<Record<GapSeverity, number>> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3,
};

/** A set of capabilities the system needs but lacks. Immutable once created. */
export interface VarietyGap {
  readonly requiredCapabilities: readonly string[];
  readonly severity: GapSeverity;
  /** Who reported the gap (`injected`, a gap source name, ...). */
  readonly source: string;
  readonly observedAt: string;
}

/** What gap sources get to look at on every tick. */
export interface GapContext {
  mappedCapabilities: readonly string[];
  inFlightCapabilities: readonly string[];
}

/** Computes gaps from the state of the system. */
export interface IGapSource {
  readonly name: string;
  observe(context: GapContext): VarietyGap[] | Promise<VarietyGap[]>;
}

// ============================================================================
// ACQUISITION STATE
// ============================================================================

export type AcquisitionStage =
  | 'detected'
  | 'discovering'
  | 'installing'
  | 'spawning'
  | 'handshaking'
  | 'registered'
  | 'failed';

/** Stages an attempt can fail in. */
export type WorkingStage = Exclude<AcquisitionStage, 'registered' | 'failed'>;

export interface AcquisitionFailure {
  stage: WorkingStage;
  reason: string;
  /** A `VarietyErrorCode` value. */
  code: string;
}

export interface SelectedCandidate {
  packageName: string;
  version: string;
  sourceOrigin: CandidateOrigin;
  score: number;
}

/** Read-only status of one capability's most recent acquisition. */
export interface AcquisitionSnapshot {
  capability: string;
  stage: AcquisitionStage;
  /** Attempts made for this capability since the engine started. */
  attempt: number;
  consecutiveFailures: number;
  severity: GapSeverity;
  gapSource: string;
  startedAt: string;
  updatedAt: string;
  finishedAt?: string;
  candidatesConsidered?: number;
  candidate?: SelectedCandidate;
  installDir?: string;
  processId?: string;
  toolName?: string;
  failure?: AcquisitionFailure;
  /** When a failed capability may be attempted again. */
  nextEligibleAt?: string;
  /** Set once `maxAttempts` consecutive failures were reached. */
  parked?: boolean;
}

// ============================================================================
// EVENTS
// ============================================================================

export interface GapAcceptedEvent {
  type: 'gap:accepted';
  timestamp: string;
  gap: VarietyGap;
}

export interface AcquisitionStageEvent {
  type: 'acquisition:stage';
  timestamp: string;
  capability: string;
  stage: AcquisitionStage;
  snapshot: AcquisitionSnapshot;
}

export interface AcquisitionRegisteredEvent {
  type: 'acquisition:registered';
  timestamp: string;
  capability: string;
  snapshot: AcquisitionSnapshot;
}

export interface AcquisitionFailedEvent {
  type: 'acquisition:failed';
  timestamp: string;
  capability: string;
  failure: AcquisitionFailure;
  snapshot: AcquisitionSnapshot;
}

export interface ProcessLostEvent {
  type: 'process:lost';
  timestamp: string;
  processId: string;
  packageName: string;
  status: ProcessStatus;
  capabilities: string[];
}

export type MonitorEvent =
  | GapAcceptedEvent
  | AcquisitionStageEvent
  | AcquisitionRegisteredEvent
  | AcquisitionFailedEvent
  | ProcessLostEvent;

export type MonitorEventListener = (event: MonitorEvent) => void;
