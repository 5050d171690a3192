/**
 * Manifest collaborator exports barrel file.
 */
export {
  collectDependencies,
  RecordingManifestEditor,
  DEFAULT_DEPENDENCY_KEY,
  ANY_VERSION,
} from './editor.js';
export type { ManifestEditor, DependencyRequest, WorkspaceMemberRequest } from './editor.js';
