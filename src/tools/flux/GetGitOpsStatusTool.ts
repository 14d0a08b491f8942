import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import {
  evaluateResource,
  formatStatus,
  type DerivedStatus,
} from '../../kubernetes/ConditionEvaluator.js';
import { Flux, type ResourceDescriptor } from '../../kubernetes/ResourceDescriptor.js';
import {
  findCondition,
  getName,
  getNamespace,
  getStatus,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderTable, truncate } from '../../utils/ReportRenderer.js';
import { type BaseTool, CommonSchemas, optionalNamespace, parseParams } from '../BaseTool.js';
import { tryList } from '../QueryHelpers.js';

const ParamsSchema = z.object({
  namespace: optionalNamespace,
});

const FAILURE_MESSAGE_WIDTH = 100;

interface FamilySummary {
  label: string;
  counts: Record<Exclude<DerivedStatus, 'Unknown'>, number>;
  failed: string[];
  error?: string;
}

/**
 * Ready/Failed/Suspended counts for Kustomizations and GitRepositories
 */
export class GetGitOpsStatusTool implements BaseTool {
  tool: Tool = {
    name: 'get_gitops_status',
    description:
      'Get overall GitOps health: counts of ready, failed and suspended Flux Kustomizations and GitRepositories, plus the failing objects',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { namespace } = parseParams(ParamsSchema, params);

    const families: Array<[string, ResourceDescriptor]> = [
      ['Kustomizations', Flux.Kustomization],
      ['GitRepositories', Flux.GitRepository],
    ];

    const summaries: FamilySummary[] = [];
    let firstError: Error | undefined;
    for (const [label, descriptor] of families) {
      const outcome = await tryList(connection.resources, descriptor, namespace);
      if (outcome.ok) {
        summaries.push(this.countItems(label, descriptor.kind, outcome.items));
        continue;
      }
      if (!firstError) firstError = outcome.error;
      summaries.push({
        label,
        counts: { Ready: 0, Failed: 0, Suspended: 0 },
        failed: [],
        error: outcome.error.message,
      });
    }

    // Nothing to report when no family answered
    if (firstError && summaries.every((summary) => summary.error !== undefined)) {
      throw firstError;
    }

    return this.render(summaries, namespace);
  }

  private countItems(
    label: string,
    kind: string,
    items: Array<Record<string, unknown>>,
  ): FamilySummary {
    const summary: FamilySummary = {
      label,
      counts: { Ready: 0, Failed: 0, Suspended: 0 },
      failed: [],
    };

    for (const item of items) {
      const status = evaluateResource(item);
      if (status === 'Unknown') continue;
      summary.counts[status]++;
      if (status === 'Failed') {
        const message = findCondition(getStatus(item), 'Ready')?.message || 'no Ready condition';
        summary.failed.push(
          `- ${kind} ${getNamespace(item)}/${getName(item)}: ${truncate(message, FAILURE_MESSAGE_WIDTH)}`,
        );
      }
    }
    return summary;
  }

  private render(summaries: FamilySummary[], namespace?: string): string {
    const lines = ['## GitOps Status Summary', '', `**Namespace:** ${namespace ?? 'all'}`];

    for (const summary of summaries) {
      lines.push('', `### ${summary.label}`, '');
      if (summary.error !== undefined) {
        lines.push(`⚠️ ${summary.error}`);
        continue;
      }
      const { Ready, Failed, Suspended } = summary.counts;
      lines.push(
        renderTable(
          ['Status', 'Count'],
          [
            [formatStatus('Ready'), String(Ready)],
            [formatStatus('Failed'), String(Failed)],
            [formatStatus('Suspended'), String(Suspended)],
            ['**Total**', String(Ready + Failed + Suspended)],
          ],
        ),
      );
    }

    const failed = summaries.flatMap((summary) => summary.failed);
    lines.push('', `**Health:** ${this.health(summaries, failed.length)}`);

    if (failed.length > 0) {
      lines.push('', '### Failed Resources', '', ...failed);
    }

    return lines.join('\n');
  }

  /**
   * A family that could not be listed may hide failures, so it is never healthy
   */
  private health(summaries: FamilySummary[], failedCount: number): string {
    if (failedCount > 0) return '❌ Issues Detected';
    if (summaries.some((summary) => summary.error !== undefined)) return '⚠️ Incomplete';
    return '✅ Healthy';
  }
}
