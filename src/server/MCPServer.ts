import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { EventEmitter } from 'events';
import winston from 'winston';
import { DEFAULT_LOG_FILE, type LoggingConfig } from '../config/ServerConfig.js';
import { sanitizeArgumentsForLog } from '../utils/InputValidation.js';
import { toMcpToolResult } from '../utils/McpToolResult.js';
import { VERSION } from '../version.js';

export const SERVER_NAME = 'gitops-status-mcp';

/**
 * Plugin interface for extending MCP server functionality
 */
export interface MCPPlugin {
  name: string;
  initialize(server: MCPServer): Promise<void>;
  shutdown?(): Promise<void>;
}

export type ToolHandler = (params: unknown) => Promise<string>;

/**
 * Tool registry entry
 */
interface ToolEntry {
  tool: Tool;
  handler: ToolHandler;
}

export interface MCPServerOptions {
  logging?: Partial<LoggingConfig>;
  skipTransportErrorHandling?: boolean;
  skipGracefulShutdown?: boolean;
}

/**
 * Winston logger for the server. Console output goes to stderr because
 * stdout carries the protocol.
 */
export function createLogger(config: Partial<LoggingConfig> = {}): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (config.fileEnabled) {
    transports.push(
      new winston.transports.File({
        filename: config.filePath ?? DEFAULT_LOG_FILE,
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: config.level ?? 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}

/**
 * MCP server exposing the read-only cluster report tools over stdio
 */
export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private logger: winston.Logger;
  private tools: Map<string, ToolEntry> = new Map();
  private plugins: Map<string, MCPPlugin> = new Map();
  private isShuttingDown = false;
  private options: MCPServerOptions;
  private eventListeners: Array<{
    target: EventEmitter;
    event: string;
    handler: (...args: unknown[]) => void;
  }> = [];

  constructor(options: MCPServerOptions = {}) {
    this.options = options;
    this.logger = createLogger(options.logging);

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    this.transport = new StdioServerTransport();

    // Skipped in tests
    if (!options.skipTransportErrorHandling) {
      this.setupTransportErrorHandling();
    }

    this.setupHandlers();

    if (!this.options.skipGracefulShutdown) {
      this.setupGracefulShutdown();
    }

    this.logger.info('MCPServer initialized');
  }

  /**
   * Add an event listener and track it for cleanup
   */
  private addTrackedListener(
    target: EventEmitter,
    event: string,
    handler: (...args: unknown[]) => void,
  ): void {
    target.on(event, handler);
    this.eventListeners.push({ target, event, handler });
  }

  private removeAllListeners(): void {
    for (const { target, event, handler } of this.eventListeners) {
      target.removeListener(event, handler);
    }
    this.eventListeners = [];
  }

  private setupTransportErrorHandling(): void {
    this.addTrackedListener(process.stdin, 'error', (error) => {
      this.logger.error('Transport stdin error:', error);
    });
    this.addTrackedListener(process.stdout, 'error', (error) => {
      this.logger.error('Transport stdout error:', error);
    });
  }

  /**
   * Set up request handlers for MCP protocol
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.getTools();
      this.logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments),
    );
  }

  /**
   * Dispatch one tool call. An unknown tool name is a protocol error; tool
   * failures are already text.
   */
  public async callTool(name: string, args: unknown): Promise<CallToolResult> {
    const toolEntry = this.tools.get(name);
    if (!toolEntry) {
      const error = `Tool not found: ${name}`;
      this.logger.error(error);
      throw new Error(error);
    }

    this.logger.info(`Executing tool: ${name}`, {
      arguments: sanitizeArgumentsForLog(args),
    });

    const text = await toolEntry.handler(args ?? {});
    return toMcpToolResult(text);
  }

  /**
   * Register a tool with the MCP server
   */
  public registerTool(tool: Tool, handler: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool already registered: ${tool.name}, overwriting`);
    }
    this.tools.set(tool.name, { tool, handler });
    this.logger.info(`Registered tool: ${tool.name}`);
  }

  public getTools(): Tool[] {
    return Array.from(this.tools.values()).map((t) => t.tool);
  }

  /**
   * Load and initialize a plugin
   */
  public async loadPlugin(plugin: MCPPlugin): Promise<void> {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin already loaded: ${plugin.name}`);
    }

    this.logger.info(`Loading plugin: ${plugin.name}`);

    try {
      await plugin.initialize(this);
      this.plugins.set(plugin.name, plugin);
      this.logger.info(`Plugin loaded successfully: ${plugin.name}`);
    } catch (error) {
      this.logger.error(`Failed to load plugin: ${plugin.name}`, error);
      throw error;
    }
  }

  public async start(): Promise<void> {
    this.logger.info('Starting MCP server...');

    try {
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  public async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Stopping MCP server...');

    this.removeAllListeners();

    for (const [name, plugin] of this.plugins) {
      if (plugin.shutdown) {
        try {
          await plugin.shutdown();
          this.logger.info(`Plugin shutdown complete: ${name}`);
        } catch (error) {
          this.logger.error(`Plugin shutdown failed: ${name}`, error);
        }
      }
    }

    await this.server.close();
    this.logger.info('MCP server stopped');
  }

  private setupGracefulShutdown(): void {
    const shutdown = (signal: string): void => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      this.stop()
        .catch((error: unknown) => this.logger.error('Shutdown failed', error))
        .finally(() => process.exit(0));
    };

    this.addTrackedListener(process, 'SIGINT', () => shutdown('SIGINT'));
    this.addTrackedListener(process, 'SIGTERM', () => shutdown('SIGTERM'));

    this.addTrackedListener(process, 'uncaughtException', (error) => {
      this.logger.error('Uncaught exception:', error);
      shutdown('uncaughtException');
    });

    this.addTrackedListener(process, 'unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection:', reason);
      shutdown('unhandledRejection');
    });
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }

  public getServer(): Server {
    return this.server;
  }

  /**
   * Clean up event listeners (useful for tests)
   */
  public cleanup(): void {
    this.removeAllListeners();
  }
}
