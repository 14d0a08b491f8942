import type { BaseTool } from '../tools/BaseTool.js';
import { CheckPolicyViolationsTool, ListConstraintsTool } from '../tools/policy/index.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

/** Gatekeeper and Kyverno */
export class PolicyToolsPlugin extends BaseToolsPlugin {
  name = 'policy-tools';
  protected family = 'POLICY';

  protected createToolInstances(): BaseTool[] {
    return [new CheckPolicyViolationsTool(), new ListConstraintsTool()];
  }
}
