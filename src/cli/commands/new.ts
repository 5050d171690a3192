/**
 * `stampkit new <project-name>`: generate a project from a template.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { ScaffoldEngine, type ApplyRequest, type ScaffoldPlan, type ApplyResult } from '../../core/scaffold/index.js';
import { DefaultOptionResolver } from '../../core/environment/index.js';
import { PromptOptionResolver } from '../prompts.js';
import { LoggingManifestEditor } from '../manifest-editor.js';
import { collectVariable, describeError, loadCliContext, parseVariables, type CliContext } from '../context.js';
import { TemplateNotFoundError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface NewOptions {
  template?: string;
  output?: string;
  var: string[];
  yes?: boolean;
  skipPrompts?: boolean;
  templates?: string;
  workspace?: string;
  dryRun?: boolean;
  verbose?: boolean;
  config?: string;
}

/**
 * Create the new command.
 */
export function createNewCommand(): Command {
  return new Command('new')
    .description('Create a new project from a template')
    .argument('<project-name>', 'Name of the project (also the default output directory)')
    .option('-t, --template <name>', 'Template to apply (e.g. library, server/axum)')
    .option('-o, --output <dir>', 'Output directory (default: ./<project-name>)')
    .option('--var <key=value>', 'Set a template variable (repeatable)', collectVariable, [])
    .option('-y, --yes', 'Answer every template option with its default')
    .option('--skip-prompts', 'Leave options without a --var value unset')
    .option('--templates <dir>', 'Templates root directory')
    .option('--workspace <root>', 'Register the project as a member of this workspace')
    .option('--dry-run', 'Show what would be written without writing')
    .option('--verbose', 'Trace every scaffolding step')
    .option('--config <path>', 'Path to config file')
    .action(async (projectName: string, options: NewOptions) => {
      try {
        await runNew(projectName, options);
      } catch (error) {
        log.error(describeError(error));
        process.exit(1);
      }
    });
}

async function runNew(projectName: string, options: NewOptions): Promise<void> {
  const context = await loadCliContext(process.cwd(), options);
  const prompts = options.yes ? null : new PromptOptionResolver();

  const engine = new ScaffoldEngine({
    templatesRoot: context.templatesRoot,
    resolver: prompts ?? new DefaultOptionResolver(),
    manifestEditor: new LoggingManifestEditor(log),
    extraTextExtensions: context.config.extra_text_extensions,
    defaultManifest: context.config.manifest,
  });

  const request: ApplyRequest = {
    templateName: options.template ?? context.config.default_template,
    targetDir: path.resolve(context.cwd, options.output ?? projectName),
    projectName,
    variables: parseVariables(options.var),
    skipOptionPrompts: options.skipPrompts === true,
    ...(options.workspace ? { workspaceRoot: path.resolve(context.cwd, options.workspace) } : {}),
  };

  try {
    if (options.dryRun) {
      printPlan(await withFallback(context, request, (req) => engine.plan(req)));
    } else {
      printResult(projectName, await withFallback(context, request, (req) => engine.apply(req)));
    }
  } finally {
    prompts?.close();
  }
}

/**
 * Run once; when the template is not found, warn and retry with the default template.
 */
async function withFallback<T>(
  context: CliContext,
  request: ApplyRequest,
  run: (request: ApplyRequest) => Promise<T>
): Promise<T> {
  try {
    return await run(request);
  } catch (error) {
    const fallback = context.config.default_template;
    if (!(error instanceof TemplateNotFoundError) || request.templateName === fallback) {
      throw error;
    }
    log.warn(`Template '${request.templateName}' not found; using '${fallback}'`);
    return run({ ...request, templateName: fallback });
  }
}

function printPlan(plan: ScaffoldPlan): void {
  console.log();
  console.log(chalk.bold('Dry Run - Would generate:'));
  console.log(chalk.dim(`Template: ${plan.templateName} (${plan.kind})`));
  if (plan.redirects.length > 1) {
    console.log(chalk.dim(`Redirects: ${plan.redirects.join(' -> ')}`));
  }
  console.log(chalk.dim(`Target: ${plan.targetDir}`));
  console.log();

  for (const operation of plan.operations) {
    const marker = operation.sourceKind === 'missing' ? chalk.red(' (missing)') : '';
    const guard = operation.condition ? chalk.dim(` [${operation.condition}]`) : '';
    console.log(`  ${chalk.cyan(operation.relativeSource)} -> ${operation.target}${marker}${guard}`);
  }

  for (const conflict of plan.conflicts) {
    console.log(chalk.yellow(`  ! ${conflict.target} is written by ${conflict.sources.join(', ')}`));
  }
}

function printResult(projectName: string, result: ApplyResult): void {
  log.success(`Created ${projectName} from ${result.templateName} (${result.written.length} files)`);
  console.log();
  console.log(chalk.bold('Next steps:'));
  result.nextSteps.forEach((step, i) => {
    console.log(`  ${i + 1}. ${step}`);
  });
}
