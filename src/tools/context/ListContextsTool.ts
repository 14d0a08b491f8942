import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import type { BaseTool } from '../BaseTool.js';

export const CURRENT_MARKER = '→';

export class ListContextsTool implements BaseTool {
  tool: Tool = {
    name: 'list_contexts',
    description: 'List the contexts of the loaded kubeconfig, marking the current one',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  };

  async execute(_params: unknown, connection: ClusterConnection): Promise<string> {
    const contexts = connection.listContexts();
    return renderReport({
      title: 'Kubernetes Contexts',
      columns: ['Current', 'Name', 'Cluster', 'User'],
      rows: contexts.map((ctx) => [
        ctx.current ? CURRENT_MARKER : '',
        ctx.name,
        ctx.cluster,
        ctx.user,
      ]),
      emptyMessage: 'No contexts found in kubeconfig',
    });
  }
}
