import * as k8s from '@kubernetes/client-node';
import { Logger } from 'winston';
import { join } from 'path';
import { homedir } from 'os';
import { existsSync } from 'fs';
import { ClusterConnectionError } from './ErrorHandling.js';
import { CustomResourceOperations } from './resources/CustomResourceOperations.js';
import { CoreResourceOperations } from './resources/CoreResourceOperations.js';
import type {
  ClusterConnection,
  ClusterInfo,
  CoreReader,
  KubeContextInfo,
  ResourceReader,
} from './ClusterConnection.js';

export const SERVICE_ACCOUNT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

/**
 * Configuration options for KubernetesClient
 */
export interface KubernetesClientConfig {
  /**
   * Path to kubeconfig file. If not specified, will try default locations
   */
  kubeConfigPath?: string;

  /**
   * Specific context to use from kubeconfig. If not specified, uses current context
   */
  context?: string;

  /**
   * Only use the pod's service account, never fall back to a kubeconfig file
   */
  inCluster?: boolean;

  logger?: Logger;
}

/**
 * Authentication method types
 */
export enum AuthMethod {
  KUBECONFIG = 'kubeconfig',
  IN_CLUSTER = 'in-cluster',
}

/**
 * Connection to one API server. Tries the pod's service account first and
 * falls back to a kubeconfig file unless the configuration pins one of them.
 */
export class KubernetesClient implements ClusterConnection {
  private kc: k8s.KubeConfig;
  private coreV1Api: k8s.CoreV1Api;
  private authMethod: AuthMethod;
  private logger?: Logger;
  private _resources: CustomResourceOperations;
  private _core: CoreResourceOperations;

  constructor(private config: KubernetesClientConfig = {}) {
    this.logger = config.logger;
    this.kc = new k8s.KubeConfig();
    this.authMethod = this.initializeClient();

    this.coreV1Api = this.kc.makeApiClient(k8s.CoreV1Api);
    this._core = new CoreResourceOperations(this.coreV1Api, this.logger);
    this._resources = new CustomResourceOperations(
      this.kc.makeApiClient(k8s.CustomObjectsApi),
      this.logger,
    );
  }

  /**
   * Build a connection, failing with ClusterConnectionError when no
   * configuration source can be loaded
   */
  public static connect(config: KubernetesClientConfig = {}): KubernetesClient {
    return new KubernetesClient(config);
  }

  private initializeClient(): AuthMethod {
    const failures: string[] = [];

    for (const method of this.candidateMethods()) {
      try {
        if (method === AuthMethod.IN_CLUSTER) {
          this.initializeInClusterConfig();
        } else {
          this.initializeKubeConfig();
        }
        this.logger?.info(`Kubernetes client initialized using ${method} authentication`);
        return method;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        failures.push(`${method}: ${reason}`);
        this.logger?.debug(`Could not use ${method} configuration: ${reason}`);
      }
    }

    const message = `Failed to initialize Kubernetes client (${failures.join('; ')})`;
    this.logger?.error(message);
    throw new ClusterConnectionError(message, { attempts: failures });
  }

  /**
   * In-cluster first when running in a pod, then kubeconfig. An explicit
   * kubeconfig path or context skips in-cluster detection.
   */
  private candidateMethods(): AuthMethod[] {
    if (this.config.inCluster) {
      return [AuthMethod.IN_CLUSTER];
    }
    if (this.config.kubeConfigPath || this.config.context) {
      return [AuthMethod.KUBECONFIG];
    }
    return KubernetesClient.isRunningInCluster()
      ? [AuthMethod.IN_CLUSTER, AuthMethod.KUBECONFIG]
      : [AuthMethod.KUBECONFIG];
  }

  public static isRunningInCluster(): boolean {
    return Boolean(process.env.KUBERNETES_SERVICE_HOST) && existsSync(SERVICE_ACCOUNT_TOKEN_PATH);
  }

  /**
   * Initialize using kubeconfig file
   */
  private initializeKubeConfig(): void {
    const kubeConfigPath = this.getKubeConfigPath();

    if (!existsSync(kubeConfigPath)) {
      throw new Error(`Kubeconfig file not found at: ${kubeConfigPath}`);
    }

    this.kc.loadFromFile(kubeConfigPath);

    if (this.config.context) {
      const known = this.kc.getContexts().some((ctx) => ctx.name === this.config.context);
      if (!known) {
        throw new Error(`Context not found in kubeconfig: ${this.config.context}`);
      }
      this.kc.setCurrentContext(this.config.context);
    }

    this.logger?.debug(`Loaded kubeconfig from: ${kubeConfigPath}`);
  }

  /**
   * Initialize using in-cluster configuration
   */
  private initializeInClusterConfig(): void {
    if (!KubernetesClient.isRunningInCluster()) {
      throw new Error(
        'Not running inside a cluster (KUBERNETES_SERVICE_HOST or service account token missing)',
      );
    }
    this.kc.loadFromCluster();
    this.logger?.debug('Loaded in-cluster configuration');
  }

  /**
   * Get the path to the kubeconfig file
   */
  private getKubeConfigPath(): string {
    if (this.config.kubeConfigPath) {
      return this.config.kubeConfigPath;
    }

    // KUBECONFIG can contain multiple paths separated by :
    const kubeConfigEnv = process.env.KUBECONFIG;
    if (kubeConfigEnv) {
      for (const path of kubeConfigEnv.split(':')) {
        if (path && existsSync(path)) {
          return path;
        }
      }
    }

    return join(homedir(), '.kube', 'config');
  }

  /**
   * Get the current cluster information
   */
  public getCurrentCluster(): ClusterInfo | null {
    const cluster = this.kc.getCurrentCluster();
    return cluster ? { name: cluster.name, server: cluster.server } : null;
  }

  public getCurrentUser(): string | null {
    return this.kc.getCurrentUser()?.name ?? null;
  }

  /**
   * Get the current context name
   */
  public getCurrentContext(): string {
    return this.kc.getCurrentContext();
  }

  public listContexts(): KubeContextInfo[] {
    const current = this.kc.getCurrentContext();
    return this.kc.getContexts().map((ctx) => ({
      name: ctx.name,
      cluster: ctx.cluster,
      user: ctx.user,
      namespace: ctx.namespace,
      current: ctx.name === current,
    }));
  }

  /**
   * Get the authentication method being used
   */
  public getAuthMethod(): AuthMethod {
    return this.authMethod;
  }

  /**
   * Test the connection to the Kubernetes API server
   */
  public async testConnection(): Promise<boolean> {
    try {
      await this.coreV1Api.listNamespace();
      this.logger?.debug('Successfully connected to Kubernetes API server');
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.debug(`Kubernetes API server check failed: ${reason}`);
      return false;
    }
  }

  public get resources(): ResourceReader {
    return this._resources;
  }

  public get core(): CoreReader {
    return this._core;
  }
}
