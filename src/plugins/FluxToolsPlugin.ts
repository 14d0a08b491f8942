import type { BaseTool } from '../tools/BaseTool.js';
import {
  GetGitOpsStatusTool,
  GetHelmReleasesTool,
  GetKustomizationTool,
  ListGitRepositoriesTool,
  ListKustomizationsTool,
} from '../tools/flux/index.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

/** Flux Kustomizations, GitRepositories and HelmReleases */
export class FluxToolsPlugin extends BaseToolsPlugin {
  name = 'flux-tools';
  protected family = 'FLUX';

  protected createToolInstances(): BaseTool[] {
    return [
      new GetGitOpsStatusTool(),
      new ListKustomizationsTool(),
      new GetKustomizationTool(),
      new ListGitRepositoriesTool(),
      new GetHelmReleasesTool(),
    ];
  }
}
