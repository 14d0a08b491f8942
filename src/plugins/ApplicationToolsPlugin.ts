import type { BaseTool } from '../tools/BaseTool.js';
import { GetAppDeploymentsTool } from '../tools/apps/index.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

export class ApplicationToolsPlugin extends BaseToolsPlugin {
  name = 'app-tools';
  protected family = 'APP';

  protected createToolInstances(): BaseTool[] {
    return [new GetAppDeploymentsTool()];
  }
}
