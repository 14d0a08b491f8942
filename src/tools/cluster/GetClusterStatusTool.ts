import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { ApiUnavailableError } from '../../kubernetes/ErrorHandling.js';
import { ClusterApi } from '../../kubernetes/ResourceDescriptor.js';
import {
  getBoolean,
  getName,
  getNamespace,
  getNumber,
  getRecord,
  getStatus,
  getString,
  readConditions,
  type ResourceObject,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderReport, renderTable, truncate } from '../../utils/ReportRenderer.js';
import {
  type BaseTool,
  CommonSchemas,
  optionalNamespace,
  optionalResourceName,
  parseParams,
} from '../BaseTool.js';
import { tryList } from '../QueryHelpers.js';
import { owningCluster } from './ListMachinesTool.js';

const ParamsSchema = z.object({
  cluster_name: optionalResourceName,
  namespace: optionalNamespace,
});

const CONDITION_MESSAGE_WIDTH = 60;

export function phaseIcon(phase: string): string {
  if (phase === 'Provisioned') return '✅';
  if (phase === 'Provisioning') return '⏳';
  return '❌';
}

/**
 * Sum of `status.readyReplicas` over the cluster's MachineDeployments, or
 * undefined when MachineDeployments could not be listed
 */
export function readyWorkers(
  machineDeployments: ResourceObject[] | undefined,
  cluster: ResourceObject,
): number | undefined {
  if (!machineDeployments) return undefined;
  return machineDeployments
    .filter(
      (deployment) =>
        getNamespace(deployment) === getNamespace(cluster) &&
        owningCluster(deployment) === getName(cluster),
    )
    .reduce((total, deployment) => total + (getNumber(deployment, 'status', 'readyReplicas') ?? 0), 0);
}

function formatWorkers(count: number | undefined): string {
  return count === undefined ? '-' : String(count);
}

export class GetClusterStatusTool implements BaseTool {
  tool: Tool = {
    name: 'get_cluster_status',
    description:
      'Get Cluster API cluster status: phase, infrastructure and control plane readiness, ready workers. With cluster_name, shows topology, endpoint and conditions',
    inputSchema: {
      type: 'object',
      properties: {
        cluster_name: CommonSchemas.clusterName,
        namespace: CommonSchemas.namespace,
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { cluster_name, namespace } = parseParams(ParamsSchema, params);

    let items: ResourceObject[];
    try {
      items = await connection.resources.list(ClusterApi.Cluster, namespace);
    } catch (error) {
      if (error instanceof ApiUnavailableError) {
        throw new ApiUnavailableError(
          `Cluster API is not installed or not accessible: ${error.message}`,
          error.details,
        );
      }
      throw error;
    }

    const clusters = items.filter((cluster) => !cluster_name || getName(cluster) === cluster_name);
    if (cluster_name && clusters.length === 0) {
      return `No CAPI cluster named '${cluster_name}' found`;
    }

    // Worker counts are optional; a missing MachineDeployment API shows '-'
    const outcome =
      clusters.length > 0
        ? await tryList(connection.resources, ClusterApi.MachineDeployment, namespace)
        : undefined;
    const machineDeployments = outcome?.ok ? outcome.items : undefined;

    if (cluster_name) {
      return clusters
        .map((cluster) => this.renderDetail(cluster, readyWorkers(machineDeployments, cluster)))
        .join('\n\n');
    }

    return renderReport({
      title: 'CAPI Clusters',
      columns: ['', 'Name', 'Namespace', 'Phase', 'Infra Ready', 'CP Ready', 'Workers'],
      rows: clusters.map((cluster) => {
        const phase = getString(cluster, 'status', 'phase') ?? 'Unknown';
        return [
          phaseIcon(phase),
          getName(cluster),
          getNamespace(cluster),
          phase,
          String(getBoolean(cluster, 'status', 'infrastructureReady') ?? false),
          String(getBoolean(cluster, 'status', 'controlPlaneReady') ?? false),
          formatWorkers(readyWorkers(machineDeployments, cluster)),
        ];
      }),
      emptyMessage: 'No CAPI clusters found',
    });
  }

  private renderDetail(cluster: ResourceObject, workers: number | undefined): string {
    const phase = getString(cluster, 'status', 'phase') ?? 'Unknown';
    const lines = [
      `## Cluster: ${getNamespace(cluster)}/${getName(cluster)}`,
      '',
      `**Phase:** ${phaseIcon(phase)} ${phase}`,
      `**Infrastructure Ready:** ${getBoolean(cluster, 'status', 'infrastructureReady') ?? false}`,
      `**Control Plane Ready:** ${getBoolean(cluster, 'status', 'controlPlaneReady') ?? false}`,
      `**Workers:** ${formatWorkers(workers)}`,
    ];

    const topology = getRecord(cluster, 'spec', 'topology');
    if (topology) {
      lines.push('', '### Topology', '');
      lines.push(`- **ClusterClass:** ${getString(topology, 'class') ?? 'N/A'}`);
      lines.push(`- **Kubernetes Version:** ${getString(topology, 'version') ?? 'N/A'}`);
    }

    const host = getString(cluster, 'spec', 'controlPlaneEndpoint', 'host');
    if (host) {
      const port = getNumber(cluster, 'spec', 'controlPlaneEndpoint', 'port');
      lines.push('', '### Control Plane Endpoint', '');
      lines.push(`**Endpoint:** ${port === undefined ? host : `${host}:${port}`}`);
    }

    const conditions = readConditions(getStatus(cluster));
    lines.push('', '### Conditions', '');
    if (conditions.length === 0) {
      lines.push('No conditions reported yet.');
    } else {
      lines.push(
        renderTable(
          ['Type', 'Status', 'Reason', 'Message'],
          conditions.map((condition) => [
            condition.type,
            condition.status,
            condition.reason,
            truncate(condition.message, CONDITION_MESSAGE_WIDTH),
          ]),
        ),
      );
    }

    return lines.join('\n');
  }
}
