export { GetGitOpsStatusTool } from './GetGitOpsStatusTool.js';
export { ListKustomizationsTool } from './ListKustomizationsTool.js';
export { GetKustomizationTool } from './GetKustomizationTool.js';
export { ListGitRepositoriesTool } from './ListGitRepositoriesTool.js';
export { GetHelmReleasesTool } from './GetHelmReleasesTool.js';
