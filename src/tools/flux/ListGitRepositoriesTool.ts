import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../../kubernetes/ClusterConnection.js';
import { isReady, formatStatus } from '../../kubernetes/ConditionEvaluator.js';
import { Flux } from '../../kubernetes/ResourceDescriptor.js';
import {
  getName,
  getNamespace,
  getRecord,
  getStatus,
  getString,
  type ResourceObject,
} from '../../kubernetes/utils/ObjectAccessors.js';
import { renderReport } from '../../utils/ReportRenderer.js';
import { type BaseTool, CommonSchemas, optionalNamespace, parseParams } from '../BaseTool.js';

const ParamsSchema = z.object({
  namespace: optionalNamespace,
});

/** Branch, else tag, semver range or commit */
export function gitReference(repository: ResourceObject): string {
  const ref = getRecord(repository, 'spec', 'ref');
  return (
    getString(ref, 'branch') ??
    getString(ref, 'tag') ??
    getString(ref, 'semver') ??
    getString(ref, 'commit') ??
    'N/A'
  );
}

export class ListGitRepositoriesTool implements BaseTool {
  tool: Tool = {
    name: 'list_gitrepositories',
    description: 'List Flux GitRepositories with readiness, tracked branch and URL',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
      },
    },
  };

  async execute(params: unknown, connection: ClusterConnection): Promise<string> {
    const { namespace } = parseParams(ParamsSchema, params);
    const items = await connection.resources.list(Flux.GitRepository, namespace);

    const rows = items.map((item) => [
      getName(item),
      getNamespace(item),
      formatStatus(isReady(getStatus(item)) ? 'Ready' : 'Failed'),
      gitReference(item),
      getString(item, 'spec', 'url') ?? 'N/A',
    ]);

    return renderReport({
      title: 'Flux GitRepositories',
      columns: ['Name', 'Namespace', 'Status', 'Branch', 'URL'],
      rows,
      emptyMessage: 'No GitRepositories found',
    });
  }
}
