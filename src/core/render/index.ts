/**
 * Renderer exports barrel file.
 */
export {
  TEMPLATE_MARKER,
  substitutePlaceholders,
  processConditionalBlocks,
  renderText,
  findPlaceholders,
  stripTemplateMarker,
  renderTargetPath,
} from './placeholders.js';
export {
  TEXT_EXTENSIONS,
  TEXT_FILENAMES,
  SCRIPT_EXTENSIONS,
  IGNORED_DIRECTORIES,
  isTemplateProcessed,
  renderFile,
  renderTree,
} from './renderer.js';
export type { RenderOptions, RenderTreeOptions, RenderedFile } from './renderer.js';
