/**
 * Manifest editor used by the CLI: reports requests instead of editing files.
 */
import type { DependencyRequest, ManifestEditor, WorkspaceMemberRequest } from '../core/manifest/index.js';
import { logger, type Logger } from '../utils/logger.js';

export class LoggingManifestEditor implements ManifestEditor {
  constructor(private readonly log: Logger = logger) {}

  async addDependency(request: DependencyRequest): Promise<void> {
    const features = request.features.length > 0 ? ` (features: ${request.features.join(', ')})` : '';
    this.log.info(`Dependency ${request.name} = "${request.version}"${features} -> ${request.manifestPath}`);
  }

  async addWorkspaceMember(request: WorkspaceMemberRequest): Promise<void> {
    this.log.info(`Workspace member ${request.memberPath} -> ${request.workspaceRoot}`);
  }
}
