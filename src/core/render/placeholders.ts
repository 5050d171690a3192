/**
 * Placeholder and conditional-block substitution over text.
 *
 * - `{{identifier}}` is replaced by the string form of the variable; identifiers
 *   absent from the environment stay as literal text.
 * - `{{#if (eq variable "value")}} ... {{/if}}` keeps its content (markers
 *   stripped) when the variable equals the value, and is removed entirely
 *   otherwise. The first `{{/if}}` after a start marker closes it; a start
 *   marker with no end marker leaves the rest of the text untouched.
 */
import type { Environment } from '../environment/index.js';

/** File-name suffix marking a file as a template */
export const TEMPLATE_MARKER = '.template';

const BLOCK_END = '{{/if}}';

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

const BLOCK_START_PATTERN = /\{\{#if\s+\(eq\s+([A-Za-z_][A-Za-z0-9_]*)\s+(?:"([^"]*)"|'([^']*)')\s*\)\s*\}\}/g;

/**
 * Replace `{{identifier}}` placeholders with environment values.
 */
export function substitutePlaceholders(text: string, env: Environment): string {
  return text.replace(PLACEHOLDER_PATTERN, (match: string, name: string) => {
    const value = env.getString(name);
    return value === undefined ? match : value;
  });
}

/**
 * Resolve `{{#if (eq var "value")}}` regions against the environment.
 */
export function processConditionalBlocks(text: string, env: Environment): string {
  const start = new RegExp(BLOCK_START_PATTERN.source, 'g');
  let result = '';
  let cursor = 0;

  for (;;) {
    start.lastIndex = cursor;
    const match = start.exec(text);
    if (!match) break;

    const bodyStart = match.index + match[0].length;
    const endIndex = text.indexOf(BLOCK_END, bodyStart);
    if (endIndex === -1) break;

    result += text.slice(cursor, match.index);

    const variable = match[1];
    const expected = match[2] ?? match[3] ?? '';
    if (env.getString(variable) === expected) {
      result += processConditionalBlocks(text.slice(bodyStart, endIndex), env);
    }

    cursor = endIndex + BLOCK_END.length;
  }

  return result + text.slice(cursor);
}

/**
 * Full text rendering: conditional blocks first, then placeholders.
 */
export function renderText(text: string, env: Environment): string {
  return substitutePlaceholders(processConditionalBlocks(text, env), env);
}

/**
 * Identifiers of the placeholders left in a text.
 */
export function findPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return Array.from(names);
}

/**
 * Remove a trailing template marker from a file name or path.
 */
export function stripTemplateMarker(fileName: string): string {
  return fileName.endsWith(TEMPLATE_MARKER) ? fileName.slice(0, -TEMPLATE_MARKER.length) : fileName;
}

/**
 * Render a relative target path: substitute placeholders in every segment and
 * drop the template marker from the final segment.
 */
export function renderTargetPath(target: string, env: Environment): string {
  return stripTemplateMarker(substitutePlaceholders(target, env));
}
