import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { renderTable, truncate } from '../../utils/ReportRenderer.js';
import {
  type BaseTool,
  choiceOf,
  CommonSchemas,
  optionalNamespace,
  parseParams,
} from '../BaseTool.js';
import { type PolicyViolation, scanGatekeeper, scanKyverno } from './PolicyQueries.js';

export const POLICY_ENGINES = ['gatekeeper', 'kyverno', 'both'] as const;
const MESSAGE_WIDTH = 50;

const ParamsSchema = z.object({
  namespace: optionalNamespace,
  policy_engine: choiceOf(
    z
      .enum(POLICY_ENGINES, {
        errorMap: () => ({ message: `must be one of: ${POLICY_ENGINES.join(', ')}` }),
      })
      .default('both'),
  ),
});

export class CheckPolicyViolationsTool implements BaseTool {
  tool: Tool = {
    name: 'check_policy_violations',
    description:
      'Check Gatekeeper constraint violations and failing Kyverno policy report results',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
        policy_engine: {
          type: 'string',
          enum: [...POLICY_ENGINES],
          description: 'Policy engine to check (default: both)',
        },
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { namespace, policy_engine } = parseParams(ParamsSchema, params);

    const violations: PolicyViolation[] = [];
    const warnings: string[] = [];
    if (policy_engine === 'gatekeeper' || policy_engine === 'both') {
      const scan = await scanGatekeeper(connection.resources, namespace);
      violations.push(...scan.violations);
      warnings.push(...scan.warnings);
    }
    if (policy_engine === 'kyverno' || policy_engine === 'both') {
      const scan = await scanKyverno(connection.resources, namespace);
      violations.push(...scan.violations);
      warnings.push(...scan.warnings);
    }

    const lines = ['## Policy Violations', '', `**Engine(s) checked:** ${policy_engine}`];
    if (namespace) lines.push(`**Namespace:** ${namespace}`);
    lines.push('');

    if (violations.length === 0) {
      lines.push('**Result:** ✅ No violations found');
    } else {
      lines.push(
        `**Violations found:** ${violations.length}`,
        '',
        renderTable(
          ['Engine', 'Policy', 'Resource', { header: 'Message', maxWidth: MESSAGE_WIDTH }],
          violations.map((v) => [v.engine, v.policy, v.resource, v.message]),
        ),
      );
    }

    if (warnings.length > 0) {
      lines.push('', ...warnings.map((warning) => `⚠️ Skipped ${warning}`));
    }
    return lines.join('\n');
  }
}
