import { isRecord } from '../ErrorHandling.js';

/**
 * A resource as returned by the API server, decoded into a schema-agnostic
 * document. Field access goes through the helpers below.
 */
export type ResourceObject = Record<string, unknown>;

export interface Condition {
  type: string;
  status: string;
  reason: string;
  message: string;
  lastTransitionTime: string;
}

/**
 * Walk a nested document by key path. Returns undefined as soon as a
 * segment is missing or not an object.
 */
export function getPath(source: unknown, ...path: string[]): unknown {
  let current: unknown = source;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function getString(source: unknown, ...path: string[]): string | undefined {
  const value = getPath(source, ...path);
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(source: unknown, ...path: string[]): number | undefined {
  const value = getPath(source, ...path);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function getBoolean(source: unknown, ...path: string[]): boolean | undefined {
  const value = getPath(source, ...path);
  return typeof value === 'boolean' ? value : undefined;
}

export function getRecord(
  source: unknown,
  ...path: string[]
): Record<string, unknown> | undefined {
  const value = getPath(source, ...path);
  return isRecord(value) ? value : undefined;
}

/** Only the object entries of an array field */
export function getRecordArray(source: unknown, ...path: string[]): Record<string, unknown>[] {
  const value = getPath(source, ...path);
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function getName(resource: ResourceObject): string {
  return getString(resource, 'metadata', 'name') ?? '';
}

export function getNamespace(resource: ResourceObject): string {
  return getString(resource, 'metadata', 'namespace') ?? '';
}

export function getLabels(resource: ResourceObject): Record<string, string> {
  const labels = getRecord(resource, 'metadata', 'labels') ?? {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels)) {
    if (typeof value === 'string') result[key] = value;
  }
  return result;
}

export function getSpec(resource: ResourceObject): Record<string, unknown> | undefined {
  return getRecord(resource, 'spec');
}

export function getStatus(resource: ResourceObject): Record<string, unknown> | undefined {
  return getRecord(resource, 'status');
}

/**
 * Conditions in server order. Entries without a string `type` are dropped;
 * missing text fields become empty strings.
 */
export function readConditions(status: unknown): Condition[] {
  return getRecordArray(status, 'conditions')
    .filter((entry) => typeof entry.type === 'string')
    .map((entry) => ({
      type: getString(entry, 'type') ?? '',
      status: getString(entry, 'status') ?? '',
      reason: getString(entry, 'reason') ?? '',
      message: getString(entry, 'message') ?? '',
      lastTransitionTime: getString(entry, 'lastTransitionTime') ?? '',
    }));
}

export function findCondition(status: unknown, type: string): Condition | undefined {
  return readConditions(status).find((condition) => condition.type === type);
}
