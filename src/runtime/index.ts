export {
  VarietyRuntime,
  buildCandidateSources,
  createVarietyRuntime,
  type CreateVarietyRuntimeOptions,
  type RunningProcessInfo,
  type VarietyRuntimeComponents,
} from './VarietyRuntime.js';
