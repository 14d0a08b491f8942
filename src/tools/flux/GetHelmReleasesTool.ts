import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { evaluateResource, formatStatus } from '../../kubernetes/ConditionEvaluator.js';
import { Flux } from '../../kubernetes/ResourceDescriptor.js';
import {
  getName,
  getNamespace,
  getString,
  type ResourceObject,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import { type BaseTool, CommonSchemas, optionalNamespace, parseParams } from '../BaseTool.js';
import { matchesStatusFilter, statusFilterParam, statusFilterSchema } from './StatusFilter.js';

const ParamsSchema = z.object({
  namespace: optionalNamespace,
  status_filter: statusFilterParam,
});

/** Inline chart template first, then a chartRef to a HelmChart/OCIRepository */
export function chartName(release: ResourceObject): string {
  return (
    getString(release, 'spec', 'chart', 'spec', 'chart') ??
    getString(release, 'spec', 'chartRef', 'name') ??
    'N/A'
  );
}

export function chartVersion(release: ResourceObject): string {
  return (
    getString(release, 'spec', 'chart', 'spec', 'version') ??
    getString(release, 'status', 'lastAttemptedRevision') ??
    'N/A'
  );
}

export class GetHelmReleasesTool implements BaseTool {
  tool: Tool = {
    name: 'get_helmreleases',
    description: 'List Flux HelmReleases with derived status, chart name and chart version',
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
    const items = await connection.resources.list(Flux.HelmRelease, namespace);

    const rows: string[][] = [];
    for (const item of items) {
      const status = evaluateResource(item);
      if (!matchesStatusFilter(status, status_filter)) continue;
      rows.push([
        getName(item),
        getNamespace(item),
        formatStatus(status),
        chartName(item),
        chartVersion(item),
      ]);
    }

    return renderReport({
      title: 'Flux HelmReleases',
      columns: ['Name', 'Namespace', 'Status', 'Chart', 'Version'],
      rows,
      emptyMessage:
        status_filter === 'all'
          ? 'No HelmReleases found'
          : `No HelmReleases found with status '${status_filter}'`,
    });
  }
}
