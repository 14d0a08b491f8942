import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection, ClusterEvent } from '../../kubernetes/ClusterConnection.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import {
  type BaseTool,
  choiceOf,
  CommonSchemas,
  optionalResourceName,
  parseParams,
  positiveIntString,
  requiredNamespace,
} from '../BaseTool.js';

export const DEFAULT_EVENT_LIMIT = 20;

const ParamsSchema = z.object({
  namespace: requiredNamespace,
  resource_name: optionalResourceName,
  event_type: choiceOf(z.enum(['all', 'normal', 'warning']).default('all')),
  limit: positiveIntString(DEFAULT_EVENT_LIMIT),
});

export interface EventQuery {
  resourceName?: string;
  eventType: 'all' | 'normal' | 'warning';
  limit: number;
}

function seenAt(event: ClusterEvent): number {
  if (!event.lastSeen) return Number.NEGATIVE_INFINITY;
  const time = Date.parse(event.lastSeen);
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Newest first, then filter, then cut to the limit. Events without a
 * timestamp sort as the oldest.
 */
export function selectEvents(events: ClusterEvent[], query: EventQuery): ClusterEvent[] {
  return [...events]
    .sort((a, b) => seenAt(b) - seenAt(a) || 0)
    .filter((event) => !query.resourceName || event.involvedName === query.resourceName)
    .filter(
      (event) => query.eventType === 'all' || event.type.toLowerCase() === query.eventType,
    )
    .slice(0, query.limit);
}

export function typeLabel(type: string): string {
  return type === 'Warning' ? '⚠️ Warning' : `ℹ️ ${type || 'Normal'}`;
}

export class GetEventsTool implements BaseTool {
  tool: Tool = {
    name: 'get_events',
    description:
      'Get Kubernetes events of a namespace, newest first, optionally filtered by resource name and type',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.requiredNamespace,
        resource_name: {
          type: 'string',
          description: 'Only events for this resource name',
        },
        event_type: {
          type: 'string',
          description: 'Filter by event type: all, Normal, Warning (default: all)',
        },
        limit: {
          type: 'string',
          description: `Maximum number of events to return (default: ${DEFAULT_EVENT_LIMIT})`,
        },
      },
      required: ['namespace'],
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { namespace, resource_name, event_type, limit } = parseParams(ParamsSchema, params);
    const events = await connection.core.listEvents(namespace);
    const selected = selectEvents(events, {
      resourceName: resource_name,
      eventType: event_type,
      limit,
    });

    return renderReport({
      title: `Events in ${namespace}`,
      columns: [
        'Type',
        'Resource',
        'Reason',
        'Last Seen',
        'Count',
        { header: 'Message', maxWidth: 60 },
      ],
      rows: selected.map((event) => [
        typeLabel(event.type),
        `${event.involvedKind}/${event.involvedName}`,
        event.reason,
        event.lastSeen || 'N/A',
        String(event.count),
        event.message,
      ]),
      emptyMessage: `No events found in namespace ${namespace}`,
    });
  }
}
