import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { ClusterApi } from '../../kubernetes/ResourceDescriptor.js';
import {
  getLabels,
  getName,
  getNamespace,
  getString,
  type ResourceObject,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import {
  type BaseTool,
  CommonSchemas,
  optionalNamespace,
  optionalResourceName,
  parseParams,
} from '../BaseTool.js';

export const CLUSTER_NAME_LABEL = 'cluster.x-k8s.io/cluster-name';

const ParamsSchema = z.object({
  cluster_name: optionalResourceName,
  namespace: optionalNamespace,
});

/** Owning cluster from the standard label, falling back to spec.clusterName */
export function owningCluster(machine: ResourceObject): string {
  return getLabels(machine)[CLUSTER_NAME_LABEL] ?? getString(machine, 'spec', 'clusterName') ?? '';
}

export class ListMachinesTool implements BaseTool {
  tool: Tool = {
    name: 'list_machines',
    description:
      'List Cluster API Machines with their owning cluster, phase, bound node and provider ID',
    inputSchema: {
      type: 'object',
      properties: {
        cluster_name: {
          type: 'string',
          description: 'Only machines of this cluster (default: all clusters)',
        },
        namespace: CommonSchemas.namespace,
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { cluster_name, namespace } = parseParams(ParamsSchema, params);
    const machines = await connection.resources.list(ClusterApi.Machine, namespace);

    const rows = machines
      .filter((machine) => !cluster_name || owningCluster(machine) === cluster_name)
      .map((machine) => [
        getName(machine),
        getNamespace(machine),
        owningCluster(machine) || 'N/A',
        getString(machine, 'status', 'phase') ?? 'Unknown',
        getString(machine, 'status', 'nodeRef', 'name') ?? 'N/A',
        getString(machine, 'spec', 'providerID') ?? 'N/A',
      ]);

    return renderReport({
      title: 'CAPI Machines',
      columns: ['Name', 'Namespace', 'Cluster', 'Phase', 'Node', 'Provider ID'],
      rows,
      emptyMessage: 'No CAPI machines found',
    });
  }
}
