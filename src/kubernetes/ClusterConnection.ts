import type { ResourceDescriptor } from './ResourceDescriptor.js';
import type { ResourceObject } from './utils/ObjectAccessors.js';

/**
 * Dynamic reader for any served resource kind
 */
export interface ResourceReader {
  /** Namespace omitted, or a cluster-scoped kind, lists across the whole cluster */
  list(descriptor: ResourceDescriptor, namespace?: string): Promise<ResourceObject[]>;
  get(descriptor: ResourceDescriptor, name: string, namespace?: string): Promise<ResourceObject>;
}

export interface ClusterEvent {
  type: string;
  reason: string;
  message: string;
  involvedKind: string;
  involvedName: string;
  count: number;
  /** ISO timestamp of the last occurrence, empty when the server sent none */
  lastSeen: string;
}

export interface PodLogOptions {
  container?: string;
  tailLines: number;
}

/**
 * Typed reader for the core resources the diagnostics tools need
 */
export interface CoreReader {
  listEvents(namespace: string): Promise<ClusterEvent[]>;
  readPodLog(podName: string, namespace: string, options: PodLogOptions): Promise<string>;
}

export interface KubeContextInfo {
  name: string;
  cluster: string;
  user: string;
  namespace?: string;
  current: boolean;
}

export interface ClusterInfo {
  name: string;
  server: string;
}

/**
 * An established connection to one API server. Created once at start-up
 * and passed to every tool call.
 */
export interface ClusterConnection {
  readonly resources: ResourceReader;
  readonly core: CoreReader;
  listContexts(): KubeContextInfo[];
  getCurrentContext(): string;
  getCurrentCluster(): ClusterInfo | null;
  getCurrentUser(): string | null;
}
