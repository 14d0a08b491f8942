import type { BaseTool } from '../tools/BaseTool.js';
import { GetCurrentContextTool, ListContextsTool } from '../tools/context/index.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

export class ContextToolsPlugin extends BaseToolsPlugin {
  name = 'context-tools';
  protected family = 'CONTEXT';

  protected createToolInstances(): BaseTool[] {
    return [new ListContextsTool(), new GetCurrentContextTool()];
  }
}
