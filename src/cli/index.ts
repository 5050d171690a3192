/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createNewCommand } from './commands/new.js';
import { createListCommand } from './commands/list.js';
import { createInfoCommand } from './commands/info.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('stampkit')
    .description('Generate projects from declarative templates')
    .version(VERSION);
  [createNewCommand, createListCommand, createInfoCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
