export { ProcessSupervisor } from './ProcessSupervisor.js';
export type { ProcessSupervisorOptions } from './ProcessSupervisor.js';
export { ChildProcessTransport } from './ChildProcessTransport.js';
export { resolveEntryPoint } from './resolveEntryPoint.js';
export { HealthMonitor } from './HealthMonitor.js';
export type {
  PingTarget,
  HealthStatus,
  HealthEvent,
  HealthEventListener,
  HealthCheckFailedEvent,
  ProcessUnhealthyEvent,
  HealthMonitorOptions,
} from './HealthMonitor.js';
export type {
  ProcessStatus,
  SpawnRequest,
  ProcessSnapshot,
  ProcessStartedEvent,
  ProcessExitedEvent,
  SupervisorEvent,
  SupervisorEventListener,
  ResolvedEntryPoint,
} from './types.js';
