export { ListContextsTool } from './ListContextsTool.js';
export { GetCurrentContextTool } from './GetCurrentContextTool.js';
