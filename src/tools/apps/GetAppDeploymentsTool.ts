import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { isReady } from '../../kubernetes/ConditionEvaluator.js';
import { Kommander, type ResourceDescriptor } from '../../kubernetes/ResourceDescriptor.js';
import {
  getName,
  getNamespace,
  getStatus,
  getString,
  type ResourceObject,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import {
  type BaseTool,
  optionalNamespace,
  optionalResourceName,
  parseParams,
} from '../BaseTool.js';
import { tryList } from '../QueryHelpers.js';

const ParamsSchema = z.object({
  workspace: optionalNamespace,
  app_name: optionalResourceName,
});

export const NO_APPS_MESSAGE = 'No Kommander Apps/ClusterApps found (Kommander may not be installed)';

export interface AppDeployment {
  source: string;
  name: string;
  namespace: string;
  ready: boolean;
  version: string;
}

function toDeployment(source: string, app: ResourceObject): AppDeployment {
  return {
    source,
    name: getName(app),
    namespace: getNamespace(app) || '-',
    ready: isReady(getStatus(app)),
    version: getString(app, 'spec', 'appVersion') ?? getString(app, 'spec', 'version') ?? 'N/A',
  };
}

/**
 * Namespaced App objects and cluster-scoped ClusterApp objects. Each kind is
 * queried on its own so one missing API does not hide the other.
 */
export class GetAppDeploymentsTool implements BaseTool {
  tool: Tool = {
    name: 'get_app_deployments',
    description:
      'Get Kommander application deployments (App and ClusterApp) with readiness, per workspace',
    inputSchema: {
      type: 'object',
      properties: {
        workspace: {
          type: 'string',
          description: 'Workspace namespace to scope Apps to (default: all workspaces)',
        },
        app_name: {
          type: 'string',
          description: 'Only applications with this name',
        },
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { workspace, app_name } = parseParams(ParamsSchema, params);

    const sources: Array<[ResourceDescriptor, string | undefined]> = [
      [Kommander.App, workspace],
      [Kommander.ClusterApp, undefined],
    ];

    const deployments: AppDeployment[] = [];
    const unavailable: string[] = [];
    for (const [descriptor, namespace] of sources) {
      const outcome = await tryList(connection.resources, descriptor, namespace);
      if (!outcome.ok) {
        unavailable.push(`${descriptor.kind}: ${outcome.error.message}`);
        continue;
      }
      deployments.push(
        ...outcome.items
          .filter((app) => !app_name || getName(app) === app_name)
          .map((app) => toDeployment(descriptor.kind, app)),
      );
    }

    if (deployments.length === 0) {
      return NO_APPS_MESSAGE;
    }

    return renderReport({
      title: 'Kommander Applications',
      columns: ['Type', 'Name', 'Namespace', 'Status', 'Version'],
      rows: deployments.map((deployment) => [
        deployment.source,
        deployment.name,
        deployment.namespace,
        deployment.ready ? '✅ Ready' : '❌ Not Ready',
        deployment.version,
      ]),
      summary:
        unavailable.length > 0
          ? unavailable.map((reason) => `⚠️ Skipped ${reason}`).join('\n')
          : undefined,
    });
  }
}
