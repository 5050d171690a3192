/**
 * Template locator exports barrel file.
 */
export { locateTemplate, listTemplates } from './locator.js';
export type { TemplateLocation, TemplateSummary } from './locator.js';
