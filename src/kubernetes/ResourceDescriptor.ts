/**
 * Identifies a resource type served by the API server, including custom
 * resources that are only known at run time.
 */
export interface ResourceDescriptor {
  readonly group: string;
  readonly version: string;
  readonly kind: string;
  /** Defaults to the pluralized, lowercased kind */
  readonly plural?: string;
  /** Defaults to true */
  readonly namespaced?: boolean;
}

export function pluralOf(descriptor: ResourceDescriptor): string {
  if (descriptor.plural) return descriptor.plural;
  const lower = descriptor.kind.toLowerCase();
  if (/[^aeiou]y$/.test(lower)) return `${lower.slice(0, -1)}ies`;
  if (/(s|x|ch|sh)$/.test(lower)) return `${lower}es`;
  return `${lower}s`;
}

export function isNamespaced(descriptor: ResourceDescriptor): boolean {
  return descriptor.namespaced !== false;
}

export function apiVersionOf(descriptor: ResourceDescriptor): string {
  return descriptor.group ? `${descriptor.group}/${descriptor.version}` : descriptor.version;
}

/** e.g. `Kustomization (kustomize.toolkit.fluxcd.io/v1)` */
export function describeDescriptor(descriptor: ResourceDescriptor): string {
  return `${descriptor.kind} (${apiVersionOf(descriptor)})`;
}

export const Flux = {
  Kustomization: {
    group: 'kustomize.toolkit.fluxcd.io',
    version: 'v1',
    kind: 'Kustomization',
    plural: 'kustomizations',
  },
  GitRepository: {
    group: 'source.toolkit.fluxcd.io',
    version: 'v1',
    kind: 'GitRepository',
    plural: 'gitrepositories',
  },
  HelmRelease: {
    group: 'helm.toolkit.fluxcd.io',
    version: 'v2',
    kind: 'HelmRelease',
    plural: 'helmreleases',
  },
} as const satisfies Record<string, ResourceDescriptor>;

export const ClusterApi = {
  Cluster: {
    group: 'cluster.x-k8s.io',
    version: 'v1beta1',
    kind: 'Cluster',
    plural: 'clusters',
  },
  Machine: {
    group: 'cluster.x-k8s.io',
    version: 'v1beta1',
    kind: 'Machine',
    plural: 'machines',
  },
  MachineDeployment: {
    group: 'cluster.x-k8s.io',
    version: 'v1beta1',
    kind: 'MachineDeployment',
    plural: 'machinedeployments',
  },
} as const satisfies Record<string, ResourceDescriptor>;

export const Kommander = {
  App: {
    group: 'apps.kommander.d2iq.io',
    version: 'v1alpha2',
    kind: 'App',
    plural: 'apps',
  },
  ClusterApp: {
    group: 'apps.kommander.d2iq.io',
    version: 'v1alpha2',
    kind: 'ClusterApp',
    plural: 'clusterapps',
    namespaced: false,
  },
} as const satisfies Record<string, ResourceDescriptor>;

export const Gatekeeper = {
  ConstraintTemplate: {
    group: 'templates.gatekeeper.sh',
    version: 'v1',
    kind: 'ConstraintTemplate',
    plural: 'constrainttemplates',
    namespaced: false,
  },
} as const satisfies Record<string, ResourceDescriptor>;

/** Constraint kinds are generated from templates; their plural is the lowercased kind */
export function gatekeeperConstraint(kind: string): ResourceDescriptor {
  return {
    group: 'constraints.gatekeeper.sh',
    version: 'v1beta1',
    kind,
    plural: kind.toLowerCase(),
    namespaced: false,
  };
}

export const Kyverno = {
  PolicyReport: {
    group: 'wgpolicyk8s.io',
    version: 'v1alpha2',
    kind: 'PolicyReport',
    plural: 'policyreports',
  },
  ClusterPolicyReport: {
    group: 'wgpolicyk8s.io',
    version: 'v1alpha2',
    kind: 'ClusterPolicyReport',
    plural: 'clusterpolicyreports',
    namespaced: false,
  },
} as const satisfies Record<string, ResourceDescriptor>;
