import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection, ClusterEvent } from '../../kubernetes/ClusterConnection.js';
import { evaluateResource, formatStatus } from '../../kubernetes/ConditionEvaluator.js';
import { convertApiError } from '../../kubernetes/ErrorHandling.js';
import { Flux, type ResourceDescriptor } from '../../kubernetes/ResourceDescriptor.js';
import {
  findCondition,
  getRecord,
  getRecordArray,
  getStatus,
  getString,
  readConditions,
  type Condition,
  type ResourceObject,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderTable, truncate } from '../../utils/ReportRenderer.js';
import {
  type BaseTool,
  choiceOf,
  CommonSchemas,
  parseParams,
  requiredNamespace,
  requiredResourceName,
} from '../BaseTool.js';
import { selectEvents, typeLabel } from './GetEventsTool.js';

const RESOURCE_TYPES = {
  kustomization: Flux.Kustomization,
  gitrepository: Flux.GitRepository,
  helmrelease: Flux.HelmRelease,
} as const satisfies Record<string, ResourceDescriptor>;

const RESOURCE_TYPE_NAMES = ['kustomization', 'gitrepository', 'helmrelease'] as const;

const ParamsSchema = z.object({
  resource_type: choiceOf(
    z.enum(RESOURCE_TYPE_NAMES, {
      errorMap: () => ({ message: `must be one of: ${RESOURCE_TYPE_NAMES.join(', ')}` }),
    }),
  ),
  name: requiredResourceName,
  namespace: requiredNamespace,
});

const MESSAGE_WIDTH = 50;
const TIMESTAMP_WIDTH = 19;
const SOURCE_MESSAGE_WIDTH = 100;
const EVENT_MESSAGE_WIDTH = 60;

export const RECENT_EVENT_LIMIT = 10;

/**
 * Substrings of a failing Ready reason and the hint each one adds
 */
export const RECOMMENDATION_RULES: ReadonlyArray<{ match: string; hint: string }> = [
  {
    match: 'Source',
    hint: 'Check if the source (GitRepository/HelmRepository) exists and is ready',
  },
  {
    match: 'Validation',
    hint: 'Check the manifest syntax and Kubernetes API compatibility',
  },
  {
    match: 'Health',
    hint: 'Check if deployed resources are healthy (pods running, etc.)',
  },
];

export const NO_RECOMMENDATION = 'No specific recommendations; inspect the conditions above.';

export function recommendationsFor(conditions: Condition[]): string[] {
  const hints: string[] = [];
  for (const condition of conditions) {
    if (condition.type !== 'Ready' || condition.status !== 'False') continue;
    for (const rule of RECOMMENDATION_RULES) {
      if (condition.reason.includes(rule.match)) hints.push(rule.hint);
    }
  }
  return hints;
}

export class DebugReconciliationTool implements BaseTool {
  tool: Tool = {
    name: 'debug_reconciliation',
    description:
      'Debug a failing Flux reconciliation: derived status, conditions, source and dependency readiness, recent events and remediation hints',
    inputSchema: {
      type: 'object',
      properties: {
        resource_type: {
          type: 'string',
          description: 'Type of resource: kustomization, gitrepository, helmrelease',
          enum: [...RESOURCE_TYPE_NAMES],
        },
        name: CommonSchemas.name,
        namespace: CommonSchemas.requiredNamespace,
      },
      required: ['resource_type', 'name', 'namespace'],
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { resource_type, name, namespace } = parseParams(ParamsSchema, params);
    const descriptor = RESOURCE_TYPES[resource_type];
    const resource = await connection.resources.get(descriptor, name, namespace);
    const conditions = readConditions(getStatus(resource));

    const lines = [
      `## Debug: ${descriptor.kind}/${name}`,
      '',
      `**Namespace:** ${namespace}`,
      `**Status:** ${formatStatus(evaluateResource(resource))}`,
      '',
      '### Conditions',
      '',
    ];

    if (conditions.length === 0) {
      lines.push('No conditions reported yet.');
    } else {
      lines.push(
        renderTable(
          ['Type', 'Status', 'Reason', 'Last Transition', 'Message'],
          conditions.map((condition) => [
            condition.type,
            condition.status,
            condition.reason,
            condition.lastTransitionTime.slice(0, TIMESTAMP_WIDTH),
            truncate(condition.message, MESSAGE_WIDTH),
          ]),
        ),
      );
    }

    if (descriptor.kind === Flux.Kustomization.kind) {
      lines.push(...(await this.sourceSection(resource, namespace, connection)));
      lines.push(...(await this.dependencySection(resource, namespace, connection)));
    }
    lines.push(...(await this.eventSection(descriptor, name, namespace, connection)));

    const hints = recommendationsFor(conditions);
    lines.push('', '### Recommendations', '');
    lines.push(...(hints.length > 0 ? hints : [NO_RECOMMENDATION]).map((hint) => `- ${hint}`));

    return lines.join('\n');
  }

  private async sourceSection(
    resource: ResourceObject,
    namespace: string,
    connection: ClusterConnection,
  ): Promise<string[]> {
    const sourceRef = getRecord(resource, 'spec', 'sourceRef');
    if (!sourceRef) return [];

    const kind = getString(sourceRef, 'kind') ?? 'N/A';
    const sourceName = getString(sourceRef, 'name') ?? '';
    const sourceNamespace = getString(sourceRef, 'namespace') || namespace;
    const lines = [
      '',
      '### Source Reference',
      '',
      `- **Kind:** ${kind}`,
      `- **Name:** ${sourceNamespace}/${sourceName}`,
    ];
    if (kind !== Flux.GitRepository.kind || !sourceName) return lines;

    try {
      const source = await connection.resources.get(Flux.GitRepository, sourceName, sourceNamespace);
      const status = evaluateResource(source);
      lines.push(`- **Status:** ${formatStatus(status)}`);
      if (status === 'Failed') {
        const message = findCondition(getStatus(source), 'Ready')?.message || 'no Ready condition';
        lines.push(`- **Message:** ${truncate(message, SOURCE_MESSAGE_WIDTH)}`);
      }
    } catch (error) {
      lines.push(`- **Status:** ⚠️ ${convertApiError(error).message}`);
    }
    return lines;
  }

  private async dependencySection(
    resource: ResourceObject,
    namespace: string,
    connection: ClusterConnection,
  ): Promise<string[]> {
    const dependencies = getRecordArray(resource, 'spec', 'dependsOn').filter(
      (dependency) => typeof dependency.name === 'string',
    );
    if (dependencies.length === 0) return [];

    const rows: string[][] = [];
    for (const dependency of dependencies) {
      const dependencyName = getString(dependency, 'name') ?? '';
      const dependencyNamespace = getString(dependency, 'namespace') || namespace;
      let status: string;
      try {
        const found = await connection.resources.get(
          Flux.Kustomization,
          dependencyName,
          dependencyNamespace,
        );
        status = formatStatus(evaluateResource(found));
      } catch (error) {
        status = `⚠️ ${convertApiError(error).message}`;
      }
      rows.push([`${dependencyNamespace}/${dependencyName}`, status]);
    }

    return ['', '### Dependencies', '', renderTable(['Dependency', 'Status'], rows)];
  }

  /**
   * Events about this object only, newest first. A failed event read is
   * reported inline and does not fail the whole call.
   */
  private async eventSection(
    descriptor: ResourceDescriptor,
    name: string,
    namespace: string,
    connection: ClusterConnection,
  ): Promise<string[]> {
    const lines = ['', '### Recent Events', ''];

    let events: ClusterEvent[];
    try {
      events = await connection.core.listEvents(namespace);
    } catch (error) {
      lines.push(`⚠️ Could not read events: ${convertApiError(error).message}`);
      return lines;
    }

    const recent = selectEvents(
      events.filter((event) => event.involvedKind === descriptor.kind),
      { resourceName: name, eventType: 'all', limit: RECENT_EVENT_LIMIT },
    );
    if (recent.length === 0) {
      lines.push('No recent events found.');
      return lines;
    }

    lines.push(
      renderTable(
        ['Type', 'Reason', 'Last Seen', { header: 'Message', maxWidth: EVENT_MESSAGE_WIDTH }],
        recent.map((event) => [
          typeLabel(event.type),
          event.reason,
          event.lastSeen || 'N/A',
          event.message,
        ]),
      ),
    );
    return lines;
  }
}
