#!/usr/bin/env node
/**
 * GitOps status MCP server
 * Main entry point for the Model Context Protocol server
 */

import type { Logger } from 'winston';
import { loadServerConfig, type ServerConfig } from './config/ServerConfig.js';
import type { ClusterConnection } from './kubernetes/ClusterConnection.js';
import { KubernetesClient } from './kubernetes/KubernetesClient.js';
import { ApplicationToolsPlugin } from './plugins/ApplicationToolsPlugin.js';
import type { BaseToolsPlugin } from './plugins/BaseToolsPlugin.js';
import { ClusterApiToolsPlugin } from './plugins/ClusterApiToolsPlugin.js';
import { ContextToolsPlugin } from './plugins/ContextToolsPlugin.js';
import { DebugToolsPlugin } from './plugins/DebugToolsPlugin.js';
import { FluxToolsPlugin } from './plugins/FluxToolsPlugin.js';
import { PolicyToolsPlugin } from './plugins/PolicyToolsPlugin.js';
import { MCPServer } from './server/MCPServer.js';

export { VERSION } from './version.js';

/**
 * Every tool family, in registration order
 */
export function createPlugins(
  connection: ClusterConnection,
  config: Pick<ServerConfig, 'toolTimeoutMs' | 'redactLogs'>,
  env: Record<string, string | undefined> = process.env,
): BaseToolsPlugin[] {
  const options = { timeoutMs: config.toolTimeoutMs, env };
  return [
    new FluxToolsPlugin(connection, options),
    new ClusterApiToolsPlugin(connection, options),
    new ApplicationToolsPlugin(connection, options),
    new PolicyToolsPlugin(connection, options),
    new DebugToolsPlugin(connection, { ...options, redactLogs: config.redactLogs }),
    new ContextToolsPlugin(connection, options),
  ];
}

/**
 * A failed check is not fatal: the server still starts and each tool
 * reports the connection error it gets.
 */
export async function checkApiServer(
  client: Pick<KubernetesClient, 'testConnection'>,
  logger: Logger,
): Promise<boolean> {
  const reachable = await client.testConnection();
  if (!reachable) {
    logger.warn('Kubernetes API server is not reachable; tools will report connection errors');
  }
  return reachable;
}

export async function main(): Promise<void> {
  console.error(`GitOps Status MCP Server - Starting...`);

  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const server = new MCPServer({ logging: config.logging });
  const logger = server.getLogger();

  let client: KubernetesClient;
  try {
    client = KubernetesClient.connect({
      kubeConfigPath: config.kubeConfigPath,
      context: config.context,
      inCluster: config.inCluster,
      logger,
    });
  } catch (error) {
    logger.error('Cannot connect to the cluster', error);
    process.exit(1);
  }
  logger.info(`Using ${client.getAuthMethod()} credentials, context: ${client.getCurrentContext()}`);
  await checkApiServer(client, logger);

  try {
    for (const plugin of createPlugins(client, config)) {
      await server.loadPlugin(plugin);
    }
    await server.start();
    console.error(`GitOps Status MCP is running. Waiting for connections...`);
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}
