import {
  GetClusterStatusTool,
  phaseIcon,
  readyWorkers,
} from '../../../src/tools/cluster/GetClusterStatusTool';
import { CLUSTER_NAME_LABEL } from '../../../src/tools/cluster/ListMachinesTool';
import { ApiUnavailableError, AuthorizationError } from '../../../src/kubernetes/ErrorHandling';
import { ClusterApi } from '../../../src/kubernetes/ResourceDescriptor';
import { FakeClusterConnection } from '../../helpers/FakeClusterConnection';

function cluster(
  name: string,
  namespace: string,
  status: Record<string, unknown>,
  spec: Record<string, unknown> = {},
) {
  return { kind: 'Cluster', metadata: { name, namespace }, spec, status };
}

function machineDeployment(
  name: string,
  namespace: string,
  clusterName: string,
  readyReplicas?: number,
) {
  return {
    kind: 'MachineDeployment',
    metadata: { name, namespace, labels: { [CLUSTER_NAME_LABEL]: clusterName } },
    status: readyReplicas === undefined ? {} : { readyReplicas },
  };
}

describe('GetClusterStatusTool', () => {
  const tool = new GetClusterStatusTool();
  let connection: FakeClusterConnection;

  beforeEach(() => {
    connection = new FakeClusterConnection();
    connection.resources
      .add(
        ClusterApi.Cluster,
        cluster(
          'prod',
          'clusters',
          {
            phase: 'Provisioned',
            infrastructureReady: true,
            controlPlaneReady: true,
            conditions: [
              { type: 'Ready', status: 'True', reason: '', message: '' },
              {
                type: 'ControlPlaneReady',
                status: 'True',
                reason: 'Available',
                message: 'all 3 control plane machines are available',
              },
            ],
          },
          {
            topology: { class: 'quick-start', version: 'v1.29.2' },
            controlPlaneEndpoint: { host: '10.0.0.10', port: 6443 },
          },
        ),
        cluster('edge', 'clusters', { phase: 'Provisioning', infrastructureReady: true }),
        cluster('broken', 'lab', {}),
      )
      .add(
        ClusterApi.MachineDeployment,
        machineDeployment('prod-md-0', 'clusters', 'prod', 2),
        machineDeployment('prod-md-1', 'clusters', 'prod', 1),
        machineDeployment('edge-md-0', 'clusters', 'edge'),
        machineDeployment('prod-md-0', 'lab', 'prod', 5),
      );
  });

  it('should map phases to icons', () => {
    expect(phaseIcon('Provisioned')).toBe('✅');
    expect(phaseIcon('Provisioning')).toBe('⏳');
    expect(phaseIcon('Failed')).toBe('❌');
  });

  it('should render every cluster with its ready workers', async () => {
    const result = await tool.execute({}, connection);

    expect(result).toBe(
      [
        '## CAPI Clusters',
        '',
        '|  | Name | Namespace | Phase | Infra Ready | CP Ready | Workers |',
        '|---|------|-----------|-------|-------------|----------|---------|',
        '| ✅ | prod | clusters | Provisioned | true | true | 3 |',
        '| ⏳ | edge | clusters | Provisioning | true | false | 0 |',
        '| ❌ | broken | lab | Unknown | false | false | 0 |',
      ].join('\n'),
    );
  });

  it('should count only MachineDeployments of the same cluster and namespace', () => {
    const deployments = [
      machineDeployment('a', 'clusters', 'prod', 2),
      machineDeployment('b', 'lab', 'prod', 4),
      machineDeployment('c', 'clusters', 'edge', 8),
    ];

    expect(readyWorkers(deployments, cluster('prod', 'clusters', {}))).toBe(2);
    expect(readyWorkers(undefined, cluster('prod', 'clusters', {}))).toBeUndefined();
  });

  it('should show a dash when MachineDeployments cannot be read', async () => {
    connection.resources.fail(
      ClusterApi.MachineDeployment,
      new ApiUnavailableError('MachineDeployment API is not available'),
    );

    const result = await tool.execute({ namespace: 'lab' }, connection);

    expect(result.split('\n').slice(4)).toEqual(['| ❌ | broken | lab | Unknown | false | false | - |']);
  });

  it('should render the detail view for a named cluster', async () => {
    const result = await tool.execute({ cluster_name: 'prod' }, connection);

    expect(result).toBe(
      [
        '## Cluster: clusters/prod',
        '',
        '**Phase:** ✅ Provisioned',
        '**Infrastructure Ready:** true',
        '**Control Plane Ready:** true',
        '**Workers:** 3',
        '',
        '### Topology',
        '',
        '- **ClusterClass:** quick-start',
        '- **Kubernetes Version:** v1.29.2',
        '',
        '### Control Plane Endpoint',
        '',
        '**Endpoint:** 10.0.0.10:6443',
        '',
        '### Conditions',
        '',
        '| Type | Status | Reason | Message |',
        '|------|--------|--------|---------|',
        '| Ready | True |  |  |',
        '| ControlPlaneReady | True | Available | all 3 control plane machines are available |',
      ].join('\n'),
    );
  });

  it('should leave out topology and endpoint a cluster does not declare', async () => {
    const result = await tool.execute({ cluster_name: 'edge' }, connection);

    expect(result).toBe(
      [
        '## Cluster: clusters/edge',
        '',
        '**Phase:** ⏳ Provisioning',
        '**Infrastructure Ready:** true',
        '**Control Plane Ready:** false',
        '**Workers:** 0',
        '',
        '### Conditions',
        '',
        'No conditions reported yet.',
      ].join('\n'),
    );
  });

  it('should report a named cluster that does not exist', async () => {
    await expect(tool.execute({ cluster_name: 'ghost' }, connection)).resolves.toBe(
      "No CAPI cluster named 'ghost' found",
    );
    expect(connection.resources.listCalls.map((call) => call.kind)).toEqual(['Cluster']);
  });

  it('should explain a missing Cluster API', async () => {
    connection.resources.fail(ClusterApi.Cluster, new ApiUnavailableError('Cluster API gone'));

    const promise = tool.execute({}, connection);
    await expect(promise).rejects.toThrow(ApiUnavailableError);
    await expect(promise).rejects.toThrow(
      'Cluster API is not installed or not accessible: Cluster API gone',
    );
  });

  it('should pass other failures through', async () => {
    const forbidden = new AuthorizationError('Forbidden');
    connection.resources.fail(ClusterApi.Cluster, forbidden);

    await expect(tool.execute({}, connection)).rejects.toBe(forbidden);
  });
});
