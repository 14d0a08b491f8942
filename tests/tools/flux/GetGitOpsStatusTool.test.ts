import { GetGitOpsStatusTool } from '../../../src/tools/flux/GetGitOpsStatusTool';
import { ApiUnavailableError, AuthorizationError } from '../../../src/kubernetes/ErrorHandling';
import { Flux } from '../../../src/kubernetes/ResourceDescriptor';
import { FakeClusterConnection, fluxObject } from '../../helpers/FakeClusterConnection';

describe('GetGitOpsStatusTool', () => {
  let connection: FakeClusterConnection;
  const tool = new GetGitOpsStatusTool();

  beforeEach(() => {
    connection = new FakeClusterConnection();
  });

  it('should count ready, failed and suspended objects per family', async () => {
    connection.resources
      .add(
        Flux.Kustomization,
        fluxObject('Kustomization', 'apps', 'flux-system', { ready: true }),
        fluxObject('Kustomization', 'infra', 'flux-system', {
          ready: false,
          message: 'kustomize build failed',
        }),
        fluxObject('Kustomization', 'paused', 'flux-system', { ready: false, suspend: true }),
      )
      .add(Flux.GitRepository, fluxObject('GitRepository', 'flux-system', 'flux-system', { ready: true }));

    const result = await tool.execute({}, connection);

    expect(result).toBe(
      [
        '## GitOps Status Summary',
        '',
        '**Namespace:** all',
        '',
        '### Kustomizations',
        '',
        '| Status | Count |',
        '|--------|-------|',
        '| ✅ Ready | 1 |',
        '| ❌ Failed | 1 |',
        '| ⏸️ Suspended | 1 |',
        '| **Total** | 3 |',
        '',
        '### GitRepositories',
        '',
        '| Status | Count |',
        '|--------|-------|',
        '| ✅ Ready | 1 |',
        '| ❌ Failed | 0 |',
        '| ⏸️ Suspended | 0 |',
        '| **Total** | 1 |',
        '',
        '**Health:** ❌ Issues Detected',
        '',
        '### Failed Resources',
        '',
        '- Kustomization flux-system/infra: kustomize build failed',
      ].join('\n'),
    );
  });

  it('should count objects without conditions as failed', async () => {
    connection.resources.add(
      Flux.Kustomization,
      fluxObject('Kustomization', 'fresh', 'apps'),
    );

    const result = await tool.execute({ namespace: 'apps' }, connection);

    expect(result).toContain('**Namespace:** apps');
    expect(result).toContain('| ❌ Failed | 1 |');
    expect(result).toContain('- Kustomization apps/fresh: no Ready condition');
  });

  it('should report healthy when nothing failed', async () => {
    connection.resources.add(
      Flux.Kustomization,
      fluxObject('Kustomization', 'apps', 'flux-system', { ready: true }),
    );

    const result = await tool.execute({}, connection);

    expect(result).toContain('**Health:** ✅ Healthy');
    expect(result).not.toContain('### Failed Resources');
  });

  it('should pass the namespace to both lists', async () => {
    await tool.execute({ namespace: 'flux-system' }, connection);

    expect(connection.resources.listCalls).toEqual([
      { kind: 'Kustomization', namespace: 'flux-system' },
      { kind: 'GitRepository', namespace: 'flux-system' },
    ]);
  });

  it('should keep the family that answered when the other fails', async () => {
    connection.resources
      .add(Flux.Kustomization, fluxObject('Kustomization', 'apps', 'flux-system', { ready: true }))
      .fail(Flux.GitRepository, new AuthorizationError('Forbidden: not allowed to list GitRepository'));

    const result = await tool.execute({}, connection);

    expect(result).toContain('| ✅ Ready | 1 |');
    expect(result).toContain('### GitRepositories\n\n⚠️ Forbidden: not allowed to list GitRepository');
    expect(result).toContain('**Health:** ⚠️ Incomplete');
    expect(result).not.toContain('✅ Healthy');
  });

  it('should still report failures found while another family is unreadable', async () => {
    connection.resources
      .add(
        Flux.Kustomization,
        fluxObject('Kustomization', 'apps', 'flux-system', { ready: false, message: 'build failed' }),
      )
      .fail(Flux.GitRepository, new AuthorizationError('Forbidden: not allowed to list GitRepository'));

    const result = await tool.execute({}, connection);

    expect(result).toContain('**Health:** ❌ Issues Detected');
    expect(result).toContain('- Kustomization flux-system/apps: build failed');
  });

  it('should fail when no family can be read', async () => {
    const missing = new ApiUnavailableError('Kustomization API is not available');
    connection.resources
      .fail(Flux.Kustomization, missing)
      .fail(Flux.GitRepository, new ApiUnavailableError('GitRepository API is not available'));

    await expect(tool.execute({}, connection)).rejects.toBe(missing);
  });

  it('should reject an invalid namespace', async () => {
    await expect(tool.execute({ namespace: 'Not_Valid' }, connection)).rejects.toThrow(
      "Invalid argument 'namespace': must be a valid Kubernetes namespace name",
    );
  });
});
