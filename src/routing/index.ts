export {
  CapabilityRouter,
  type CapabilityRoute,
  type CapabilityRouterOptions,
  type ToolInvoker,
} from './CapabilityRouter.js';
export { selectTool } from './ToolSelector.js';
