import type { ClusterConnection } from '../kubernetes/ClusterConnection.js';
import type { BaseTool } from '../tools/BaseTool.js';
import {
  DebugReconciliationTool,
  GetEventsTool,
  GetPodLogsTool,
} from '../tools/debug/index.js';
import { BaseToolsPlugin, type ToolsPluginOptions } from './BaseToolsPlugin.js';

export interface DebugToolsPluginOptions extends ToolsPluginOptions {
  /** Mask secret-looking values in pod logs (default: true) */
  redactLogs?: boolean;
}

/**
 * Reconciliation debugging, namespace events and pod logs
 */
export class DebugToolsPlugin extends BaseToolsPlugin {
  name = 'debug-tools';
  protected family = 'DEBUG';

  private redactLogs: boolean;

  constructor(connection: ClusterConnection, options: DebugToolsPluginOptions = {}) {
    super(connection, options);
    this.redactLogs = options.redactLogs ?? true;
  }

  protected createToolInstances(): BaseTool[] {
    return [
      new DebugReconciliationTool(),
      new GetEventsTool(),
      new GetPodLogsTool({ redact: this.redactLogs }),
    ];
  }
}
