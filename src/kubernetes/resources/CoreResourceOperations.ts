import type { CoreV1Api, CoreV1Event } from '@kubernetes/client-node';
import type { Logger } from 'winston';
import { convertApiError } from '../ErrorHandling.js';
import type { ClusterEvent, CoreReader, PodLogOptions } from '../ClusterConnection.js';

export type CoreClient = Pick<CoreV1Api, 'listNamespacedEvent' | 'readNamespacedPodLog'>;

function toTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  return typeof value === 'string' ? value : '';
}

/**
 * Last time the event was seen: lastTimestamp, then eventTime, then firstTimestamp
 */
export function toClusterEvent(event: CoreV1Event): ClusterEvent {
  const lastSeen =
    toTimestamp(event.lastTimestamp) ||
    toTimestamp(event.eventTime) ||
    toTimestamp(event.firstTimestamp);
  return {
    type: event.type ?? '',
    reason: event.reason ?? '',
    message: event.message ?? '',
    involvedKind: event.involvedObject?.kind ?? '',
    involvedName: event.involvedObject?.name ?? '',
    count: event.count ?? 1,
    lastSeen,
  };
}

/**
 * Events and pod logs through the typed core client
 */
export class CoreResourceOperations implements CoreReader {
  constructor(
    private readonly api: CoreClient,
    private readonly logger?: Logger,
  ) {}

  async listEvents(namespace: string): Promise<ClusterEvent[]> {
    try {
      const response = await this.api.listNamespacedEvent(namespace);
      const events = (response.body.items ?? []).map(toClusterEvent);
      this.logger?.debug(`Listed ${events.length} events in ${namespace}`);
      return events;
    } catch (error) {
      throw convertApiError(error, { operation: 'list', resource: 'Event', namespace });
    }
  }

  async readPodLog(podName: string, namespace: string, options: PodLogOptions): Promise<string> {
    try {
      const response = await this.api.readNamespacedPodLog(
        podName,
        namespace,
        options.container,
        false,
        undefined,
        undefined,
        undefined,
        false,
        undefined,
        options.tailLines,
      );
      return typeof response.body === 'string' ? response.body : '';
    } catch (error) {
      throw convertApiError(error, {
        operation: 'read',
        resource: 'Pod',
        name: podName,
        namespace,
      });
    }
  }
}
