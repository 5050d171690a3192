/**
 * `stampkit info <template>`: show what a template declares.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { ScaffoldEngine, type TemplateDescription } from '../../core/scaffold/index.js';
import { formatCondition } from '../../core/condition/index.js';
import { describeError, loadCliContext } from '../context.js';
import { logger as log } from '../../utils/logger.js';

interface InfoOptions {
  templates?: string;
  config?: string;
  json?: boolean;
}

/**
 * Create the info command.
 */
export function createInfoCommand(): Command {
  return new Command('info')
    .description('Show the options, redirects and files of a template')
    .argument('<template>', 'Template name')
    .option('--templates <dir>', 'Templates root directory')
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (templateName: string, options: InfoOptions) => {
      try {
        await runInfo(templateName, options);
      } catch (error) {
        log.error(describeError(error));
        process.exit(1);
      }
    });
}

async function runInfo(templateName: string, options: InfoOptions): Promise<void> {
  const context = await loadCliContext(process.cwd(), options);
  const engine = new ScaffoldEngine({ templatesRoot: context.templatesRoot });
  const info = await engine.describe(templateName);

  if (options.json) {
    console.log(
      JSON.stringify({ name: info.location.relativePath, dir: info.location.dir, kind: info.kind, ...info.descriptor }, null, 2)
    );
    return;
  }

  printInfo(info);
}

function printInfo({ location, descriptor, kind }: TemplateDescription): void {
  console.log();
  console.log(`${chalk.bold(descriptor.name ?? location.relativePath)} ${chalk.dim(`[${kind}]`)}`);
  if (descriptor.description) {
    console.log(descriptor.description);
  }
  console.log(chalk.dim(location.dir));

  if (descriptor.options.length > 0) {
    console.log();
    console.log(chalk.bold('Options:'));
    for (const option of descriptor.options) {
      const choices = option.options ? ` (${option.options.join(' | ')})` : '';
      const fallback = option.default === undefined ? '' : chalk.dim(` default: ${String(option.default)}`);
      console.log(`  ${chalk.cyan(option.name)} ${option.type}${choices}${fallback}`);
      if (option.description) {
        console.log(`    ${chalk.dim(option.description)}`);
      }
    }
  }

  if (descriptor.redirect) {
    console.log();
    console.log(chalk.bold(`Redirects on ${descriptor.redirect.variable}:`));
    for (const [value, target] of Object.entries(descriptor.redirect.templates)) {
      console.log(`  ${value} -> ${chalk.cyan(target)}`);
    }
  }

  for (const variant of descriptor.variants) {
    console.log();
    console.log(chalk.bold(`Variants on ${variant.variable}:`) + ` ${variant.values.join(', ')}`);
  }

  const files = descriptor.files ?? [];
  const groups = descriptor.conditional_files ?? [];
  if (files.length > 0 || groups.length > 0) {
    console.log();
    console.log(chalk.bold('Files:'));
    for (const entry of files) {
      const guard = entry.condition ? chalk.dim(` [${formatCondition(entry.condition)}]`) : '';
      console.log(`  ${entry.source} -> ${entry.target}${guard}`);
    }
    for (const group of groups) {
      console.log(`  ${chalk.dim(`when ${formatCondition(group.when)}:`)}`);
      for (const entry of group.files) {
        console.log(`    ${entry.source} -> ${entry.target}`);
      }
    }
  } else if (!descriptor.redirect) {
    console.log();
    console.log(chalk.dim('Copies the whole template directory.'));
  }
}
