import type { BaseTool } from '../tools/BaseTool.js';
import { GetClusterStatusTool, ListMachinesTool } from '../tools/cluster/index.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

export class ClusterApiToolsPlugin extends BaseToolsPlugin {
  name = 'cluster-api-tools';
  protected family = 'CLUSTER_API';

  protected createToolInstances(): BaseTool[] {
    return [new GetClusterStatusTool(), new ListMachinesTool()];
  }
}
