import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { evaluateResource, formatStatus, isSuspended } from '../../kubernetes/ConditionEvaluator.js';
import { Flux } from '../../kubernetes/ResourceDescriptor.js';
import {
  getRecord,
  getRecordArray,
  getSpec,
  getStatus,
  getString,
  readConditions,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderTable } from '../../utils/ReportRenderer.js';
import {
  type BaseTool,
  CommonSchemas,
  parseParams,
  requiredNamespace,
  requiredResourceName,
} from '../BaseTool.js';
import { displayValue, formatReference } from '../QueryHelpers.js';

const ParamsSchema = z.object({
  name: requiredResourceName,
  namespace: requiredNamespace,
});

const MESSAGE_WIDTH = 60;

/**
 * Detail view of one Kustomization
 */
export class GetKustomizationTool implements BaseTool {
  tool: Tool = {
    name: 'get_kustomization',
    description:
      'Show one Flux Kustomization: path, interval, source, dependencies, last applied revision and all conditions',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the Kustomization' },
        namespace: CommonSchemas.requiredNamespace,
      },
      required: ['name', 'namespace'],
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { name, namespace } = parseParams(ParamsSchema, params);
    const kustomization = await connection.resources.get(Flux.Kustomization, name, namespace);

    const spec = getSpec(kustomization);
    const status = getStatus(kustomization);
    const sourceRef = getRecord(spec, 'sourceRef');
    const dependsOn = getRecordArray(spec, 'dependsOn').map((dependency) =>
      formatReference(dependency, namespace),
    );

    const lines = [
      `## Kustomization: ${name}`,
      '',
      `**Namespace:** ${namespace}`,
      `**Status:** ${formatStatus(evaluateResource(kustomization))}`,
      `**Path:** ${displayValue(getString(spec, 'path'))}`,
      `**Interval:** ${displayValue(getString(spec, 'interval'))}`,
      `**Suspended:** ${isSuspended(spec)}`,
      `**Last Applied Revision:** ${displayValue(getString(status, 'lastAppliedRevision'))}`,
      '',
      '### Source',
      `- **Kind:** ${displayValue(getString(sourceRef, 'kind'))}`,
      `- **Name:** ${displayValue(getString(sourceRef, 'name'))}`,
    ];

    if (dependsOn.length > 0) {
      lines.push('', '### Depends On', ...dependsOn.map((dependency) => `- ${dependency}`));
    }

    lines.push('', '### Conditions', '');
    const conditions = readConditions(status);
    if (conditions.length === 0) {
      lines.push('No conditions reported yet.');
    } else {
      lines.push(
        renderTable(
          ['Type', 'Status', 'Reason', { header: 'Message', maxWidth: MESSAGE_WIDTH }],
          conditions.map((condition) => [
            condition.type,
            condition.status,
            condition.reason,
            condition.message,
          ]),
        ),
      );
    }

    return lines.join('\n');
  }
}
