/**
 * Zod schema for template descriptors (template.json / template.yaml).
 *
 * Conditions are parsed while validating, so the rest of the engine only
 * ever sees structured Condition values.
 */
import { z } from 'zod';
import { tryParseCondition } from '../condition/index.js';

/** Template categories that select post-apply hooks. */
export const TemplateKindSchema = z.enum([
  'server',
  'client',
  'embedded',
  'serverless',
  'data-science',
  'library',
  'generic',
]);

/** A condition expression, parsed into {lhs, op, rhs}. */
export const ConditionSchema = z.string().transform((expr, ctx) => {
  const condition = tryParseCondition(expr);
  if (!condition) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid condition '${expr}' (expected "<variable> == '<value>'" or "<variable> != '<value>'")`,
    });
    return z.NEVER;
  }
  return condition;
});

/** One source artifact mapped to one destination location. */
export const FileEntrySchema = z.object({
  /** Path relative to the template root (file or directory) */
  source: z.string().min(1),
  /** Path relative to the destination root; may contain placeholders */
  target: z.string().min(1),
  condition: ConditionSchema.optional(),
});

/** Files applied together when `when` holds. */
export const ConditionalGroupSchema = z.object({
  when: ConditionSchema,
  files: z.array(FileEntrySchema).default([]),
});

export const OptionTypeSchema = z.enum(['select', 'input', 'boolean']);

/** A prompt the caller may answer ahead of time through variables. */
export const OptionSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    type: OptionTypeSchema,
    options: z.array(z.string()).optional(),
    default: z.union([z.string(), z.boolean(), z.number()]).optional(),
  })
  .refine((option) => option.type !== 'select' || (option.options?.length ?? 0) > 0, {
    message: 'select options need at least one choice',
    path: ['options'],
  });

/** `"1.0"` or `{ version, features }`. */
export const DependencySpecSchema = z.union([
  z.string(),
  z.object({
    version: z.string().optional(),
    features: z.array(z.string()).default([]),
  }),
]);

/**
 * Dependency sets keyed by `default` (always applied) or by a variable value
 * (applied when any environment value equals the key).
 */
export const DependenciesSchema = z.record(z.string(), z.record(z.string(), DependencySpecSchema));

export const ConditionalStepsSchema = z.object({
  when: ConditionSchema,
  steps: z.array(z.string()).default([]),
});

/** Flat list, or `{ default, conditional }`. */
export const NextStepsSchema = z.union([
  z.array(z.string()),
  z.object({
    default: z.array(z.string()).default([]),
    conditional: z.array(ConditionalStepsSchema).default([]),
  }),
]);

export const PostSetupInfoSchema = z.object({
  conditional: z
    .array(
      z.object({
        when: ConditionSchema,
        message: z.string(),
      })
    )
    .default([]),
});

/** Delegate the whole apply to another template chosen by a variable. */
export const RedirectSchema = z.object({
  variable: z.string().min(1),
  templates: z.record(z.string(), z.string().min(1)),
});

/** Mutually exclusive sibling directories selected by one variable. */
export const VariantSchema = z.object({
  variable: z.string().min(1),
  /** Directory holding one subdirectory per value; top level when omitted */
  root: z.string().optional(),
  values: z.array(z.string().min(1)).min(1),
  /** Render the selected subtree onto the destination root */
  promote: z.boolean().default(false),
  /** Destination paths superseded by the promotion */
  remove: z.array(z.string()).default([]),
});

export const DescriptorSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  kind: TemplateKindSchema.optional(),
  /** Manifest that dependency requests are declared against */
  manifest: z.string().optional(),
  files: z.array(FileEntrySchema).optional(),
  conditional_files: z.array(ConditionalGroupSchema).optional(),
  options: z.array(OptionSchema).default([]),
  dependencies: DependenciesSchema.optional(),
  next_steps: NextStepsSchema.optional(),
  post_setup_info: PostSetupInfoSchema.optional(),
  redirect: RedirectSchema.optional(),
  variants: z.array(VariantSchema).default([]),
});

export type TemplateKind = z.infer<typeof TemplateKindSchema>;
export type FileEntry = z.infer<typeof FileEntrySchema>;
export type ConditionalGroup = z.infer<typeof ConditionalGroupSchema>;
export type TemplateOption = z.infer<typeof OptionSchema>;
export type OptionType = z.infer<typeof OptionTypeSchema>;
export type DependencySpec = z.infer<typeof DependencySpecSchema>;
export type NextSteps = z.infer<typeof NextStepsSchema>;
export type Redirect = z.infer<typeof RedirectSchema>;
export type Variant = z.infer<typeof VariantSchema>;
export type TemplateDescriptor = z.infer<typeof DescriptorSchema>;
