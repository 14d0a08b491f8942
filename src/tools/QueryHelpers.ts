import type { ResourceReader } from '../kubernetes/ClusterConnection.js';
import { convertApiError, type KubernetesError } from '../kubernetes/ErrorHandling.js';
import type { ResourceDescriptor } from '../kubernetes/ResourceDescriptor.js';
import { getRecord, getString, type ResourceObject } from '../kubernetes/utils/ObjectAccessors.js';

export type ListOutcome =
  | { ok: true; items: ResourceObject[] }
  | { ok: false; error: KubernetesError };

/**
 * List without throwing, for reports that combine several sources and must
 * keep the ones that answered.
 */
export async function tryList(
  reader: ResourceReader,
  descriptor: ResourceDescriptor,
  namespace?: string,
): Promise<ListOutcome> {
  try {
    return { ok: true, items: await reader.list(descriptor, namespace) };
  } catch (error) {
    return { ok: false, error: convertApiError(error) };
  }
}

/** `Kind/name`, or `Kind/namespace/name` when the reference crosses namespaces */
export function formatReference(reference: unknown, ownNamespace?: string): string {
  const kind = getString(reference, 'kind');
  const name = getString(reference, 'name');
  if (!name) return 'N/A';
  const namespace = getString(reference, 'namespace');
  const qualified = namespace && namespace !== ownNamespace ? `${namespace}/${name}` : name;
  return kind ? `${kind}/${qualified}` : qualified;
}

export function sourceReference(resource: ResourceObject, ownNamespace?: string): string {
  return formatReference(getRecord(resource, 'spec', 'sourceRef'), ownNamespace);
}

export function displayValue(value: string | number | boolean | undefined): string {
  if (value === undefined || value === '') return 'N/A';
  return String(value);
}
