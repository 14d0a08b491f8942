export { GetAppDeploymentsTool } from './GetAppDeploymentsTool.js';
