/**
 * @fileoverview Acquisition loop barrel exports.
 * @module variety-engine/acquisition
 */

export type {
  AcquisitionFailure,
  AcquisitionFailedEvent,
  AcquisitionRegisteredEvent,
  AcquisitionSnapshot,
  AcquisitionStage,
  AcquisitionStageEvent,
  GapAcceptedEvent,
  GapContext,
  GapSeverity,
  IGapSource,
  MonitorEvent,
  MonitorEventListener,
  ProcessLostEvent,
  SelectedCandidate,
  VarietyGap,
  WorkingStage,
} from './types.js';
export { GAP_SEVERITY_ORDER } from './types.js';
export { RetryBackoff } from './RetryBackoff.js';
export {
  DeclaredRequirementsGapSource,
  type DeclaredRequirementsGapSourceOptions,
} from './DeclaredRequirementsGapSource.js';
export {
  CapabilityAcquirer,
  type AcquisitionRequest,
  type AcquisitionResult,
  type CapabilityAcquirerOptions,
  type DiscoveryPort,
  type ICapabilityAcquirer,
  type InstallerPort,
  type ProtocolClientFactory,
  type StageUpdate,
  type SupervisorPort,
} from './CapabilityAcquirer.js';
export {
  VarietyMonitor,
  type InjectGapResult,
  type TickReport,
  type VarietyMonitorOptions,
} from './VarietyMonitor.js';
