import {
  KubernetesClient,
  AuthMethod,
  SERVICE_ACCOUNT_TOKEN_PATH,
} from '../../src/kubernetes/KubernetesClient';
import { ClusterConnectionError } from '../../src/kubernetes/ErrorHandling';
import { Logger } from 'winston';
import type { KubeConfig } from '@kubernetes/client-node';
import { existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

// Tell Jest to use the manual mock
jest.mock('@kubernetes/client-node');
jest.mock('fs');

const { kubeConfigInstances } = jest.requireMock<{ kubeConfigInstances: KubeConfig[] }>(
  '@kubernetes/client-node',
);

function latestKubeConfig(): KubeConfig {
  return kubeConfigInstances[kubeConfigInstances.length - 1];
}

describe('KubernetesClient', () => {
  let mockLogger: jest.Mocked<Logger>;
  const originalKubeconfig = process.env.KUBECONFIG;
  const originalServiceHost = process.env.KUBERNETES_SERVICE_HOST;

  beforeEach(() => {
    jest.clearAllMocks();
    delete process.env.KUBECONFIG;
    delete process.env.KUBERNETES_SERVICE_HOST;

    mockLogger = {
      info: jest.fn(),
      debug: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
    } as unknown as jest.Mocked<Logger>;

    (existsSync as jest.Mock).mockReturnValue(true);
  });

  afterAll(() => {
    process.env.KUBECONFIG = originalKubeconfig;
    process.env.KUBERNETES_SERVICE_HOST = originalServiceHost;
    if (originalKubeconfig === undefined) delete process.env.KUBECONFIG;
    if (originalServiceHost === undefined) delete process.env.KUBERNETES_SERVICE_HOST;
  });

  describe('Constructor and Initialization', () => {
    it('should initialize with default kubeconfig', () => {
      const client = new KubernetesClient();

      expect(latestKubeConfig().loadFromFile).toHaveBeenCalledWith(
        join(homedir(), '.kube', 'config'),
      );
      expect(client.getAuthMethod()).toBe(AuthMethod.KUBECONFIG);
    });

    it('should initialize with custom kubeconfig path', () => {
      const client = KubernetesClient.connect({ kubeConfigPath: '/custom/path/config' });

      expect(latestKubeConfig().loadFromFile).toHaveBeenCalledWith('/custom/path/config');
    });

    it('should throw ClusterConnectionError if kubeconfig file does not exist', () => {
      (existsSync as jest.Mock).mockReturnValue(false);

      expect(() => new KubernetesClient({ logger: mockLogger })).toThrow(ClusterConnectionError);
      expect(() => new KubernetesClient()).toThrow('Kubeconfig file not found');
    });

    it('should reject a context missing from the kubeconfig', () => {
      expect(() => new KubernetesClient({ context: 'missing' })).toThrow(
        'Context not found in kubeconfig: missing',
      );
    });

    it('should use the first existing KUBECONFIG entry', () => {
      process.env.KUBECONFIG = '/path1/config:/path2/config';
      (existsSync as jest.Mock).mockImplementation((path) => path === '/path2/config');

      const client = new KubernetesClient();

      expect(latestKubeConfig().loadFromFile).toHaveBeenCalledWith('/path2/config');
    });
  });

  describe('In-Cluster Authentication', () => {
    it('should initialize with in-cluster config', () => {
      process.env.KUBERNETES_SERVICE_HOST = '10.96.0.1';
      const client = new KubernetesClient({ inCluster: true });

      expect(latestKubeConfig().loadFromCluster).toHaveBeenCalled();
      expect(latestKubeConfig().loadFromFile).not.toHaveBeenCalled();
      expect(client.getAuthMethod()).toBe(AuthMethod.IN_CLUSTER);
    });

    it('should refuse in-cluster mode outside a pod', () => {
      (existsSync as jest.Mock).mockReturnValue(false);

      expect(() => new KubernetesClient({ inCluster: true })).toThrow(ClusterConnectionError);
      expect(() => new KubernetesClient({ inCluster: true })).toThrow(
        'in-cluster: Not running inside a cluster (KUBERNETES_SERVICE_HOST or service account token missing)',
      );
      expect(latestKubeConfig().loadFromCluster).not.toHaveBeenCalled();
    });

    it('should refuse in-cluster mode without the service host variable', () => {
      expect(() => new KubernetesClient({ inCluster: true })).toThrow(ClusterConnectionError);
    });

    it('should detect a pod environment', () => {
      process.env.KUBERNETES_SERVICE_HOST = '10.96.0.1';
      (existsSync as jest.Mock).mockImplementation((path) => path === SERVICE_ACCOUNT_TOKEN_PATH);

      const client = new KubernetesClient();

      expect(client.getAuthMethod()).toBe(AuthMethod.IN_CLUSTER);
    });

    it('should not look for a service account when a context is pinned', () => {
      process.env.KUBERNETES_SERVICE_HOST = '10.96.0.1';

      expect(() => new KubernetesClient({ context: 'missing' })).toThrow(ClusterConnectionError);
      expect(KubernetesClient.isRunningInCluster()).toBe(true);
    });
  });

  describe('Context information', () => {
    it('should list contexts and mark the current one', () => {
      const client = new KubernetesClient();
      jest.mocked(latestKubeConfig().getCurrentContext).mockReturnValue('prod');
      jest.mocked(latestKubeConfig().getContexts).mockReturnValue([
        { name: 'dev', cluster: 'dev-cluster', user: 'dev-user' },
        { name: 'prod', cluster: 'prod-cluster', user: 'admin', namespace: 'flux-system' },
      ]);

      expect(client.listContexts()).toEqual([
        {
          name: 'dev',
          cluster: 'dev-cluster',
          user: 'dev-user',
          namespace: undefined,
          current: false,
        },
        {
          name: 'prod',
          cluster: 'prod-cluster',
          user: 'admin',
          namespace: 'flux-system',
          current: true,
        },
      ]);
      expect(client.getCurrentContext()).toBe('prod');
    });

    it('should report the current cluster and user', () => {
      const client = new KubernetesClient();
      jest.mocked(latestKubeConfig().getCurrentCluster).mockReturnValue({
        name: 'prod-cluster',
        server: 'https://127.0.0.1:6443',
        skipTLSVerify: false,
      });
      jest.mocked(latestKubeConfig().getCurrentUser).mockReturnValue({ name: 'admin' });

      expect(client.getCurrentCluster()).toEqual({
        name: 'prod-cluster',
        server: 'https://127.0.0.1:6443',
      });
      expect(client.getCurrentUser()).toBe('admin');
    });

    it('should return null without a current cluster or user', () => {
      const client = new KubernetesClient();
      jest.mocked(latestKubeConfig().getCurrentCluster).mockReturnValue(null);
      jest.mocked(latestKubeConfig().getCurrentUser).mockReturnValue(null);

      expect(client.getCurrentCluster()).toBeNull();
      expect(client.getCurrentUser()).toBeNull();
    });
  });

  describe('Connection testing', () => {
    function coreApi(): { listNamespace: jest.Mock } {
      return jest.mocked(latestKubeConfig().makeApiClient).mock.results[0].value as unknown as {
        listNamespace: jest.Mock;
      };
    }

    it('should report a reachable API server', async () => {
      const client = new KubernetesClient({ logger: mockLogger });
      coreApi().listNamespace.mockResolvedValue({ body: { items: [] } });

      await expect(client.testConnection()).resolves.toBe(true);
    });

    it('should report an unreachable API server', async () => {
      const client = new KubernetesClient({ logger: mockLogger });
      coreApi().listNamespace.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(client.testConnection()).resolves.toBe(false);
      expect(mockLogger.debug).toHaveBeenCalledWith(
        'Kubernetes API server check failed: connect ECONNREFUSED',
      );
    });
  });

  it('should expose resource and core readers', () => {
    const client = new KubernetesClient();

    expect(typeof client.resources.list).toBe('function');
    expect(typeof client.core.listEvents).toBe('function');
  });
});
