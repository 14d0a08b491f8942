import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { maskTextForSensitiveValues } from '../../utils/SensitiveData.js';
import {
  type BaseTool,
  CommonSchemas,
  optionalResourceName,
  parseParams,
  positiveIntString,
  requiredNamespace,
  requiredResourceName,
} from '../BaseTool.js';

export const DEFAULT_TAIL_LINES = 100;

const ParamsSchema = z.object({
  pod_name: requiredResourceName,
  namespace: requiredNamespace,
  container: optionalResourceName,
  tail_lines: positiveIntString(DEFAULT_TAIL_LINES),
});

export interface GetPodLogsOptions {
  /** Mask tokens, passwords and keys found in the log text */
  redact: boolean;
}

/**
 * A code fence one backtick longer than any backtick run in the text, so
 * the log cannot close it early
 */
export function codeFence(text: string): string {
  const longestRun = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  return '`'.repeat(Math.max(3, longestRun + 1));
}

export class GetPodLogsTool implements BaseTool {
  tool: Tool = {
    name: 'get_pod_logs',
    description: 'Get the last lines of a pod container log',
    inputSchema: {
      type: 'object',
      properties: {
        pod_name: { type: 'string', description: 'Name of the pod' },
        namespace: CommonSchemas.requiredNamespace,
        container: {
          type: 'string',
          description: 'Container name (default: the first container of the pod)',
        },
        tail_lines: {
          type: 'string',
          description: `Number of lines from the end of the log (default: ${DEFAULT_TAIL_LINES})`,
        },
      },
      required: ['pod_name', 'namespace'],
    },
  };

  constructor(private readonly options: GetPodLogsOptions = { redact: true }) {}

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { pod_name, namespace, container, tail_lines } = parseParams(ParamsSchema, params);
    const raw = await connection.core.readPodLog(pod_name, namespace, {
      container,
      tailLines: tail_lines,
    });
    const logs = this.options.redact ? maskTextForSensitiveValues(raw) : raw;
    const containerLabel = container ? ` (container: ${container})` : '';
    const fence = codeFence(logs);

    return [
      `## Pod Logs: ${pod_name}${containerLabel}`,
      '',
      `**Namespace:** ${namespace}`,
      `**Lines:** ${tail_lines}`,
      '',
      fence,
      logs.replace(/\n$/, ''),
      fence,
    ].join('\n');
  }
}
