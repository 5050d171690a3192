/**
 * `stampkit list`: show the available templates.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { listTemplates } from '../../core/locator/index.js';
import { describeError, loadCliContext } from '../context.js';
import { logger as log } from '../../utils/logger.js';
import { truncateString } from '../../utils/string.js';

const DESCRIPTION_WIDTH = 72;

interface ListOptions {
  templates?: string;
  config?: string;
  json?: boolean;
}

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List available templates')
    .option('--templates <dir>', 'Templates root directory')
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions) => {
      try {
        await runList(options);
      } catch (error) {
        log.error(describeError(error));
        process.exit(1);
      }
    });
}

async function runList(options: ListOptions): Promise<void> {
  const context = await loadCliContext(process.cwd(), options);
  const templates = await listTemplates(context.templatesRoot);

  if (options.json) {
    console.log(JSON.stringify(templates, null, 2));
    return;
  }

  if (templates.length === 0) {
    log.warn(`No templates found in ${context.templatesRoot}`);
    return;
  }

  const width = Math.max(...templates.map((template) => template.name.length));
  console.log();
  console.log(chalk.bold(`Templates in ${context.templatesRoot}:`));
  console.log();
  for (const template of templates) {
    const name = chalk.cyan(template.name.padEnd(width));
    const kind = chalk.dim(`[${template.kind}]`);
    const detail = template.error ? chalk.red(template.error) : truncateString(template.description ?? '', DESCRIPTION_WIDTH);
    console.log(`  ${name}  ${kind} ${detail}`);
  }
}
