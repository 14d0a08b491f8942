import { CheckPolicyViolationsTool } from '../../../src/tools/policy/CheckPolicyViolationsTool';
import {
  ApiUnavailableError,
  AuthorizationError,
  InvalidArgumentError,
} from '../../../src/kubernetes/ErrorHandling';
import { Gatekeeper, gatekeeperConstraint, Kyverno } from '../../../src/kubernetes/ResourceDescriptor';
import { FakeClusterConnection } from '../../helpers/FakeClusterConnection';

describe('CheckPolicyViolationsTool', () => {
  const tool = new CheckPolicyViolationsTool();
  let connection: FakeClusterConnection;

  beforeEach(() => {
    connection = new FakeClusterConnection();
    connection.resources
      .add(Gatekeeper.ConstraintTemplate, { metadata: { name: 'k8s-required-labels' } })
      .add(gatekeeperConstraint('K8sRequiredLabels'), {
        metadata: { name: 'must-have-owner' },
        status: {
          violations: [
            { kind: 'Deployment', name: 'web', namespace: 'team-a', message: 'missing label owner' },
            { kind: 'Deployment', name: 'api', namespace: 'team-b' },
          ],
        },
      });
  });

  it('should report violations from both engines by default', async () => {
    const result = await tool.execute({}, connection);

    expect(result).toBe(
      [
        '## Policy Violations',
        '',
        '**Engine(s) checked:** both',
        '',
        '**Violations found:** 2',
        '',
        '| Engine | Policy | Resource | Message |',
        '|--------|--------|----------|---------|',
        '| Gatekeeper | must-have-owner | Deployment/web | missing label owner |',
        '| Gatekeeper | must-have-owner | Deployment/api | No message |',
      ].join('\n'),
    );
  });

  it('should scope to a namespace', async () => {
    const result = await tool.execute(
      { namespace: 'team-a', policy_engine: 'gatekeeper' },
      connection,
    );

    expect(result).toContain('**Namespace:** team-a');
    expect(result).toContain('**Violations found:** 1');
    expect(result).not.toContain('Deployment/api');
  });

  it('should report a clean cluster and skipped sources', async () => {
    connection.resources.fail(
      Kyverno.PolicyReport,
      new AuthorizationError('Forbidden: not allowed to list PolicyReport'),
    );

    const result = await tool.execute({ policy_engine: 'Kyverno' }, connection);

    expect(result).toBe(
      [
        '## Policy Violations',
        '',
        '**Engine(s) checked:** kyverno',
        '',
        '**Result:** ✅ No violations found',
        '',
        '⚠️ Skipped Kyverno PolicyReport: Forbidden: not allowed to list PolicyReport',
      ].join('\n'),
    );
  });

  it('should keep Kyverno results when Gatekeeper is missing', async () => {
    connection.resources
      .fail(Gatekeeper.ConstraintTemplate, new ApiUnavailableError('templates gone'))
      .add(Kyverno.ClusterPolicyReport, {
        metadata: { name: 'cpol' },
        results: [
          {
            policy: 'require-requests',
            result: 'fail',
            message: 'validation error: CPU and memory resource requests are required',
            resources: [{ kind: 'Pod', name: 'web-1' }],
          },
        ],
      });

    const result = await tool.execute({}, connection);

    expect(result).toContain(
      '| Kyverno | require-requests | Pod/web-1 | validation error: CPU and memory resource requests... |',
    );
    expect(result.endsWith('⚠️ Skipped Gatekeeper: templates gone')).toBe(true);
  });

  it('should reject an unknown engine', async () => {
    const promise = tool.execute({ policy_engine: 'opa' }, connection);

    await expect(promise).rejects.toThrow(InvalidArgumentError);
    await expect(promise).rejects.toThrow(
      "Invalid argument 'policy_engine': must be one of: gatekeeper, kyverno, both",
    );
  });
});
