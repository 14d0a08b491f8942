import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { evaluateResource, formatStatus } from '../../kubernetes/ConditionEvaluator.js';
import { Flux } from '../../kubernetes/ResourceDescriptor.js';
import { getName, getNamespace, getString } from '../../kubernetes/utils/ObjectAccessors.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import { type BaseTool, CommonSchemas, optionalNamespace, parseParams } from '../BaseTool.js';
import { displayValue, sourceReference } from '../QueryHelpers.js';
import { matchesStatusFilter, statusFilterParam, statusFilterSchema } from './StatusFilter.js';

const ParamsSchema = z.object({
  namespace: optionalNamespace,
  status_filter: statusFilterParam,
});

export class ListKustomizationsTool implements BaseTool {
  tool: Tool = {
    name: 'list_kustomizations',
    description:
      'List Flux Kustomizations with their derived status, source reference and sync path',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
        status_filter: statusFilterSchema,
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { namespace, status_filter } = parseParams(ParamsSchema, params);
    const items = await connection.resources.list(Flux.Kustomization, namespace);

    const rows: string[][] = [];
    for (const item of items) {
      const status = evaluateResource(item);
      if (!matchesStatusFilter(status, status_filter)) continue;
      const itemNamespace = getNamespace(item);
      rows.push([
        getName(item),
        itemNamespace,
        formatStatus(status),
        sourceReference(item, itemNamespace),
        displayValue(getString(item, 'spec', 'path')),
      ]);
    }

    return renderReport({
      title: 'Flux Kustomizations',
      columns: ['Name', 'Namespace', 'Status', 'Source', 'Path'],
      rows,
      emptyMessage:
        status_filter === 'all'
          ? 'No Kustomizations found'
          : `No Kustomizations found with status '${status_filter}'`,
      summary: `**Total:** ${rows.length}`,
    });
  }
}
