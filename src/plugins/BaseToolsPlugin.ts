import type { Logger } from 'winston';
import { DEFAULT_TOOL_TIMEOUT_MS, parseFlag } from '../config/ServerConfig.js';
import type { ClusterConnection } from '../kubernetes/ClusterConnection.js';
import {
  convertApiError,
  ErrorMonitor,
  TimeoutError,
  toErrorReport,
} from '../kubernetes/ErrorHandling.js';
import type { MCPPlugin, MCPServer, ToolHandler } from '../server/MCPServer.js';
import type { BaseTool } from '../tools/BaseTool.js';

export interface ToolsPluginOptions {
  /** Per-call limit; a call running longer is reported as a timeout */
  timeoutMs?: number;
  /** Source of the `MCP_DISABLE_<FAMILY>_TOOLS` switches */
  env?: Record<string, string | undefined>;
}

/**
 * Generic base plugin shared by every tool family. Holds the connection the
 * tools query and turns anything a tool throws into `Error:` text, so no
 * failure crosses the protocol boundary.
 */
export abstract class BaseToolsPlugin implements MCPPlugin {
  abstract name: string;

  /** Upper-case family name used in the disable switch, e.g. `FLUX` */
  protected abstract family: string;

  protected tools: BaseTool[] = [];
  protected logger?: Logger;
  protected toolMap: Map<string, BaseTool> = new Map();
  protected errorMonitor = new ErrorMonitor();

  constructor(
    protected connection: ClusterConnection,
    protected options: ToolsPluginOptions = {},
  ) {}

  /** Create tool instances for this plugin */
  protected abstract createToolInstances(): BaseTool[];

  get disableVariable(): string {
    return `MCP_DISABLE_${this.family}_TOOLS`;
  }

  protected isDisabled(): boolean {
    const env = this.options.env ?? process.env;
    return parseFlag(env[this.disableVariable]) === true;
  }

  async initialize(server: MCPServer): Promise<void> {
    this.logger = server.getLogger();
    this.errorMonitor = new ErrorMonitor(this.logger);

    if (this.isDisabled()) {
      this.logger.info(`${this.name} is disabled via ${this.disableVariable}`);
      this.tools = [];
      this.toolMap.clear();
      return;
    }

    this.tools = this.createToolInstances();
    this.toolMap.clear();
    for (const tool of this.tools) {
      this.toolMap.set(tool.tool.name, tool);
      server.registerTool(tool.tool, (params) => this.runTool(tool, params));
    }

    this.logger.info(`${this.name} initialized with ${this.tools.length} tools.`);
  }

  getToolNames(): string[] {
    return this.tools.map((tool) => tool.tool.name);
  }

  getToolFunction(toolName: string): ToolHandler | undefined {
    const tool = this.toolMap.get(toolName);
    if (!tool) return undefined;
    return (params) => this.runTool(tool, params);
  }

  getErrorMonitor(): ErrorMonitor {
    return this.errorMonitor;
  }

  /**
   * Run one tool call. Never rejects: failures come back as `Error: ...`.
   */
  protected async runTool(tool: BaseTool, params: unknown): Promise<string> {
    const label = tool.tool.name;
    try {
      return await this.withTimeout(
        tool.execute(params, this.connection),
        this.options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
        label,
      );
    } catch (error) {
      const converted = convertApiError(error);
      this.errorMonitor.recordError(converted, label);
      return toErrorReport(converted);
    }
  }

  /** Wrap a promise with a timeout */
  protected async withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, { timeoutMs }));
      }, timeoutMs);
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
