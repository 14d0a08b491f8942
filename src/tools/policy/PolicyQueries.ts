import type { ResourceReader } from '../../kubernetes/ClusterConnection.js';
import {
  Gatekeeper,
  gatekeeperConstraint,
  Kyverno,
  type ResourceDescriptor,
} from '../../kubernetes/ResourceDescriptor.js';
import {
  getName,
  getNumber,
  getRecordArray,
  getString,
  type ResourceObject,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { tryList } from '../QueryHelpers.js';

export type PolicyEngine = 'Gatekeeper' | 'Kyverno';

export interface PolicyViolation {
  engine: PolicyEngine;
  policy: string;
  resource: string;
  message: string;
}

export interface ViolationScan {
  violations: PolicyViolation[];
  /** Sources that could not be read, as display lines */
  warnings: string[];
}

export interface ConstraintKind {
  template: string;
  kind: string;
}

/**
 * Template name to constraint kind: split on `-`, upper-case the first
 * character of each segment, join. `k8s-required-labels` becomes
 * `K8sRequiredLabels`.
 */
export function constraintKindFromTemplateName(templateName: string): string {
  return templateName
    .split('-')
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join('');
}

/**
 * Constraint kinds discovered from ConstraintTemplates. Throws when the
 * template API itself cannot be read.
 */
export async function discoverConstraintKinds(reader: ResourceReader): Promise<ConstraintKind[]> {
  const templates = await reader.list(Gatekeeper.ConstraintTemplate);
  return templates
    .map(getName)
    .filter((template) => template !== '')
    .map((template) => ({ template, kind: constraintKindFromTemplateName(template) }));
}

/**
 * Constraints of each kind. A kind that cannot be listed is skipped.
 */
export async function listConstraints(
  reader: ResourceReader,
  kinds: ConstraintKind[],
): Promise<Array<{ kind: ConstraintKind; constraint: ResourceObject }>> {
  const result: Array<{ kind: ConstraintKind; constraint: ResourceObject }> = [];
  for (const kind of kinds) {
    const outcome = await tryList(reader, gatekeeperConstraint(kind.kind));
    if (!outcome.ok) continue;
    for (const constraint of outcome.items) {
      result.push({ kind, constraint });
    }
  }
  return result;
}

export function totalViolations(constraint: ResourceObject): number {
  return getNumber(constraint, 'status', 'totalViolations') ?? 0;
}

export async function scanGatekeeper(
  reader: ResourceReader,
  namespace?: string,
): Promise<ViolationScan> {
  let kinds: ConstraintKind[];
  try {
    kinds = await discoverConstraintKinds(reader);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { violations: [], warnings: [`Gatekeeper: ${reason}`] };
  }

  const violations: PolicyViolation[] = [];
  for (const { constraint } of await listConstraints(reader, kinds)) {
    for (const entry of getRecordArray(constraint, 'status', 'violations')) {
      if (namespace && getString(entry, 'namespace') !== namespace) continue;
      violations.push({
        engine: 'Gatekeeper',
        policy: getName(constraint),
        resource: `${getString(entry, 'kind') ?? ''}/${getString(entry, 'name') ?? ''}`,
        message: getString(entry, 'message') ?? 'No message',
      });
    }
  }
  return { violations, warnings: [] };
}

function failedResults(report: ResourceObject): PolicyViolation[] {
  return getRecordArray(report, 'results')
    .filter((result) => getString(result, 'result') === 'fail')
    .map((result) => {
      const [subject] = getRecordArray(result, 'resources');
      return {
        engine: 'Kyverno',
        policy: getString(result, 'policy') ?? 'Unknown',
        resource: `${getString(subject, 'kind') ?? ''}/${getString(subject, 'name') ?? ''}`,
        message: getString(result, 'message') ?? 'No message',
      };
    });
}

/**
 * Failing results of ClusterPolicyReports and PolicyReports. Namespace
 * scoping applies to PolicyReports only.
 */
export async function scanKyverno(
  reader: ResourceReader,
  namespace?: string,
): Promise<ViolationScan> {
  const sources: Array<[ResourceDescriptor, string | undefined]> = [
    [Kyverno.ClusterPolicyReport, undefined],
    [Kyverno.PolicyReport, namespace],
  ];

  const scan: ViolationScan = { violations: [], warnings: [] };
  for (const [descriptor, scope] of sources) {
    const outcome = await tryList(reader, descriptor, scope);
    if (!outcome.ok) {
      scan.warnings.push(`Kyverno ${descriptor.kind}: ${outcome.error.message}`);
      continue;
    }
    for (const report of outcome.items) {
      scan.violations.push(...failedResults(report));
    }
  }
  return scan;
}
