import {
  getBoolean,
  getSpec,
  getStatus,
  readConditions,
  type ResourceObject,
} from './utils/ObjectAccessors.js';

export type DerivedStatus = 'Ready' | 'Failed' | 'Suspended' | 'Unknown';

/**
 * True when any condition reports `Ready=True`. The whole list is scanned;
 * servers do not guarantee condition order.
 */
export function isReady(status: unknown): boolean {
  return readConditions(status).some(
    (condition) => condition.type === 'Ready' && condition.status === 'True',
  );
}

export function isSuspended(spec: unknown): boolean {
  return getBoolean(spec, 'suspend') === true;
}

/**
 * Suspension wins over readiness. An object with no conditions yet is
 * reported as Failed, same as one whose Ready condition is False.
 */
export function evaluateStatus(spec: unknown, status: unknown): DerivedStatus {
  if (isSuspended(spec)) return 'Suspended';
  if (isReady(status)) return 'Ready';
  return 'Failed';
}

export function evaluateResource(resource: ResourceObject): DerivedStatus {
  return evaluateStatus(getSpec(resource), getStatus(resource));
}

export const StatusIcons: Record<DerivedStatus, string> = {
  Ready: '✅',
  Failed: '❌',
  Suspended: '⏸️',
  Unknown: '❔',
};

export function formatStatus(status: DerivedStatus): string {
  return `${StatusIcons[status]} ${status}`;
}
