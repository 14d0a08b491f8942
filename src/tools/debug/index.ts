export { DebugReconciliationTool } from './DebugReconciliationTool.js';
export { GetEventsTool } from './GetEventsTool.js';
export { GetPodLogsTool } from './GetPodLogsTool.js';
