import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import type { BaseTool } from '../BaseTool.js';

export class GetCurrentContextTool implements BaseTool {
  tool: Tool = {
    name: 'get_current_context',
    description: 'Show the active kubeconfig context with its cluster, API server and user',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  };

  async execute(_params: unknown, connection: ClusterConnection): Promise<string> {
    const name = connection.getCurrentContext();
    const context = connection.listContexts().find((ctx) => ctx.name === name);
    const cluster = connection.getCurrentCluster();

    return [
      '## Current Context',
      '',
      `**Name:** ${name || 'N/A'}`,
      `**Cluster:** ${cluster?.name || context?.cluster || 'N/A'}`,
      `**Server:** ${cluster?.server || 'N/A'}`,
      `**User:** ${connection.getCurrentUser() ?? context?.user ?? 'N/A'}`,
      `**Namespace:** ${context?.namespace || 'default'}`,
    ].join('\n');
  }
}
