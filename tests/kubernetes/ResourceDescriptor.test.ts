import {
  apiVersionOf,
  describeDescriptor,
  Flux,
  gatekeeperConstraint,
  isNamespaced,
  Kommander,
  pluralOf,
} from '../../src/kubernetes/ResourceDescriptor';

describe('ResourceDescriptor', () => {
  it('should derive plurals from the kind', () => {
    expect(pluralOf({ group: 'g', version: 'v1', kind: 'Policy' })).toBe('policies');
    expect(pluralOf({ group: 'g', version: 'v1', kind: 'Gateway' })).toBe('gateways');
    expect(pluralOf({ group: 'g', version: 'v1', kind: 'Ingress' })).toBe('ingresses');
    expect(pluralOf({ group: 'g', version: 'v1', kind: 'Machine' })).toBe('machines');
  });

  it('should prefer an explicit plural', () => {
    expect(pluralOf(Flux.GitRepository)).toBe('gitrepositories');
  });

  it('should default to namespaced', () => {
    expect(isNamespaced(Kommander.App)).toBe(true);
    expect(isNamespaced(Kommander.ClusterApp)).toBe(false);
  });

  it('should describe the descriptor with its API version', () => {
    expect(apiVersionOf(Flux.HelmRelease)).toBe('helm.toolkit.fluxcd.io/v2');
    expect(apiVersionOf({ group: '', version: 'v1', kind: 'Event' })).toBe('v1');
    expect(describeDescriptor(Flux.Kustomization)).toBe(
      'Kustomization (kustomize.toolkit.fluxcd.io/v1)',
    );
  });

  it('should build cluster-scoped Gatekeeper constraint descriptors', () => {
    expect(gatekeeperConstraint('K8sRequiredLabels')).toEqual({
      group: 'constraints.gatekeeper.sh',
      version: 'v1beta1',
      kind: 'K8sRequiredLabels',
      plural: 'k8srequiredlabels',
      namespaced: false,
    });
  });
});
