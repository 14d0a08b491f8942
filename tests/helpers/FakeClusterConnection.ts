import type {
  ClusterConnection,
  ClusterEvent,
  ClusterInfo,
  CoreReader,
  KubeContextInfo,
  PodLogOptions,
  ResourceReader,
} from '../../src/kubernetes/ClusterConnection';
import { ResourceNotFoundError } from '../../src/kubernetes/ErrorHandling';
import { isNamespaced, type ResourceDescriptor } from '../../src/kubernetes/ResourceDescriptor';
import {
  getName,
  getNamespace,
  type ResourceObject,
} from '../../src/kubernetes/utils/ObjectAccessors';

function keyOf(descriptor: ResourceDescriptor): string {
  return `${descriptor.group}/${descriptor.version}/${descriptor.kind}`;
}

/**
 * In-memory resource store keyed by descriptor. Lists honour the namespace
 * the same way the API server does.
 */
export class FakeResourceReader implements ResourceReader {
  readonly listCalls: Array<{ kind: string; namespace?: string }> = [];
  private objects = new Map<string, ResourceObject[]>();
  private failures = new Map<string, unknown>();

  add(descriptor: ResourceDescriptor, ...items: ResourceObject[]): this {
    const key = keyOf(descriptor);
    this.objects.set(key, [...(this.objects.get(key) ?? []), ...items]);
    return this;
  }

  fail(descriptor: ResourceDescriptor, error: unknown): this {
    this.failures.set(keyOf(descriptor), error);
    return this;
  }

  async list(descriptor: ResourceDescriptor, namespace?: string): Promise<ResourceObject[]> {
    this.listCalls.push({ kind: descriptor.kind, namespace });
    const key = keyOf(descriptor);
    if (this.failures.has(key)) throw this.failures.get(key);
    const items = this.objects.get(key) ?? [];
    if (!namespace || !isNamespaced(descriptor)) return items;
    return items.filter((item) => getNamespace(item) === namespace);
  }

  async get(
    descriptor: ResourceDescriptor,
    name: string,
    namespace?: string,
  ): Promise<ResourceObject> {
    const key = keyOf(descriptor);
    if (this.failures.has(key)) throw this.failures.get(key);
    const scope = isNamespaced(descriptor) ? (namespace ?? 'default') : undefined;
    const found = (this.objects.get(key) ?? []).find(
      (item) => getName(item) === name && (scope === undefined || getNamespace(item) === scope),
    );
    if (!found) {
      throw new ResourceNotFoundError(
        `${descriptor.kind} '${name}'${scope ? ` in namespace '${scope}'` : ''} not found`,
      );
    }
    return found;
  }
}

export class FakeCoreReader implements CoreReader {
  events: Record<string, ClusterEvent[]> = {};
  logs: Record<string, string> = {};
  readonly logRequests: Array<{ pod: string; namespace: string; options: PodLogOptions }> = [];
  failure?: unknown;

  async listEvents(namespace: string): Promise<ClusterEvent[]> {
    if (this.failure !== undefined) throw this.failure;
    return this.events[namespace] ?? [];
  }

  async readPodLog(pod: string, namespace: string, options: PodLogOptions): Promise<string> {
    this.logRequests.push({ pod, namespace, options });
    if (this.failure !== undefined) throw this.failure;
    const log = this.logs[`${namespace}/${pod}`];
    if (log === undefined) {
      throw new ResourceNotFoundError(`Pod '${pod}' in namespace '${namespace}' not found`);
    }
    return log;
  }
}

export class FakeClusterConnection implements ClusterConnection {
  readonly resources = new FakeResourceReader();
  readonly core = new FakeCoreReader();
  contexts: KubeContextInfo[] = [
    { name: 'test-context', cluster: 'test-cluster', user: 'test-user', current: true },
  ];
  cluster: ClusterInfo | null = { name: 'test-cluster', server: 'https://127.0.0.1:6443' };
  user: string | null = 'test-user';

  listContexts(): KubeContextInfo[] {
    return this.contexts;
  }

  getCurrentContext(): string {
    return this.contexts.find((ctx) => ctx.current)?.name ?? '';
  }

  getCurrentCluster(): ClusterInfo | null {
    return this.cluster;
  }

  getCurrentUser(): string | null {
    return this.user;
  }
}

export interface FluxObjectOptions {
  ready?: boolean;
  reason?: string;
  message?: string;
  suspend?: boolean;
  spec?: Record<string, unknown>;
  status?: Record<string, unknown>;
}

/**
 * A Flux-style object with an optional Ready condition
 */
export function fluxObject(
  kind: string,
  name: string,
  namespace: string,
  options: FluxObjectOptions = {},
): ResourceObject {
  const conditions =
    options.ready === undefined
      ? []
      : [
          {
            type: 'Ready',
            status: options.ready ? 'True' : 'False',
            reason: options.reason ?? (options.ready ? 'ReconciliationSucceeded' : 'Failed'),
            message: options.message ?? '',
            lastTransitionTime: '2024-05-01T10:00:00Z',
          },
        ];
  return {
    kind,
    metadata: { name, namespace },
    spec: {
      ...(options.spec ?? {}),
      ...(options.suspend !== undefined ? { suspend: options.suspend } : {}),
    },
    status: { conditions, ...(options.status ?? {}) },
  };
}
