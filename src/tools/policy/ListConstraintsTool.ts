import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { getName, getString } from '../../kubernetes/utils/ObjectAccessors.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import { type BaseTool, optionalString, parseParams } from '../BaseTool.js';
import { discoverConstraintKinds, listConstraints, totalViolations } from './PolicyQueries.js';

const ParamsSchema = z.object({
  constraint_kind: optionalString,
});

export class ListConstraintsTool implements BaseTool {
  tool: Tool = {
    name: 'list_constraints',
    description:
      'List Gatekeeper constraints with their enforcement action and total violation count',
    inputSchema: {
      type: 'object',
      properties: {
        constraint_kind: {
          type: 'string',
          description:
            'Only constraints of this kind or template name, e.g. K8sRequiredLabels or k8srequiredlabels',
        },
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { constraint_kind } = parseParams(ParamsSchema, params);

    let kinds = await discoverConstraintKinds(connection.resources);
    if (constraint_kind) {
      const wanted = constraint_kind.toLowerCase();
      kinds = kinds.filter(
        ({ template, kind }) => template.toLowerCase() === wanted || kind.toLowerCase() === wanted,
      );
    }

    const rows = (await listConstraints(connection.resources, kinds)).map(
      ({ kind, constraint }) => {
        const violations = totalViolations(constraint);
        return [
          kind.kind,
          getName(constraint),
          getString(constraint, 'spec', 'enforcementAction') ?? 'deny',
          violations > 0 ? `❌ ${violations}` : '✅ 0',
        ];
      },
    );

    return renderReport({
      title: 'Gatekeeper Constraints',
      columns: ['Kind', 'Name', 'Enforcement', 'Violations'],
      rows,
      emptyMessage: 'No Gatekeeper constraints found',
      summary: `**Total:** ${rows.length}`,
    });
  }
}
