/**
 * Post-apply reporter: the "next steps" shown after a project is generated.
 *
 * Precedence:
 * 1. A side-channel file written into the target directory by a hook
 *    (read, substituted, then deleted)
 * 2. The descriptor's `next_steps` (flat list or `{ default, conditional }`),
 *    followed by matching `post_setup_info` messages
 * 3. A generic fallback
 */
import * as path from 'node:path';
import { z } from 'zod';
import type { Environment } from '../environment/index.js';
import type { TemplateDescriptor } from '../descriptor/index.js';
import { evaluateCondition } from '../condition/index.js';
import { substitutePlaceholders } from '../render/index.js';
import { fileExists, readFile, removePath } from '../../utils/file-system.js';
import { parseJson, validateWithSchema } from '../../utils/yaml.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

/** Side-channel file name, relative to the target directory */
export const NEXT_STEPS_FILENAME = '.stampkit_next_steps.json';

export const GENERIC_NEXT_STEPS: readonly string[] = [
  'Navigate to your project: cd {{project_name}}',
  'Review the generated code',
  'Build the project: cargo build',
  'Run the project: cargo run',
];

const SideChannelSchema = z.object({
  next_steps: z.array(z.string()),
});

function substituteAll(steps: readonly string[], env: Environment): string[] {
  return steps.map((step) => substitutePlaceholders(step, env));
}

/**
 * Consume the side-channel file, if present.
 *
 * Returns null when there is no file, when it holds no steps, or when it is
 * malformed (in which case it is left in place and a warning is logged).
 */
export async function consumeSideChannel(
  targetDir: string,
  env: Environment,
  log: Logger = defaultLogger
): Promise<string[] | null> {
  const filePath = path.join(targetDir, NEXT_STEPS_FILENAME);
  if (!(await fileExists(filePath))) {
    return null;
  }

  let steps: string[];
  try {
    const data = validateWithSchema(parseJson(await readFile(filePath)), SideChannelSchema);
    steps = data.next_steps;
  } catch (error) {
    log.warn(`Ignoring ${NEXT_STEPS_FILENAME}: ${errorMessage(error)}`);
    return null;
  }

  await removePath(filePath);
  return steps.length > 0 ? substituteAll(steps, env) : null;
}

/**
 * Steps declared by the descriptor for an environment.
 */
export function descriptorNextSteps(
  descriptor: Pick<TemplateDescriptor, 'next_steps' | 'post_setup_info'>,
  env: Environment
): string[] {
  const steps: string[] = [];
  const declared = descriptor.next_steps;

  if (Array.isArray(declared)) {
    steps.push(...declared);
  } else if (declared) {
    steps.push(...declared.default);
    for (const group of declared.conditional) {
      if (evaluateCondition(group.when, env)) {
        steps.push(...group.steps);
      }
    }
  }

  for (const info of descriptor.post_setup_info?.conditional ?? []) {
    if (evaluateCondition(info.when, env)) {
      steps.push(info.message);
    }
  }

  return substituteAll(steps, env);
}

/**
 * Resolve the next-step messages for a finished apply.
 */
export async function resolveNextSteps(
  descriptor: Pick<TemplateDescriptor, 'next_steps' | 'post_setup_info'>,
  targetDir: string,
  env: Environment,
  log: Logger = defaultLogger
): Promise<string[]> {
  const sideChannel = await consumeSideChannel(targetDir, env, log);
  if (sideChannel) {
    return sideChannel;
  }

  const declared = descriptorNextSteps(descriptor, env);
  if (declared.length > 0) {
    return declared;
  }

  return substituteAll(GENERIC_NEXT_STEPS, env);
}
