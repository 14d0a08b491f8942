export { GetClusterStatusTool } from './GetClusterStatusTool.js';
export { ListMachinesTool } from './ListMachinesTool.js';
