/**
 * Zod validation schemas for gitscope's own settings.
 *
 * Sections:
 *  - git: which executable to run and which file is the global scope
 *  - defaults: scope used when a call names none
 *  - output: how the CLI prints snapshots
 */

import { z } from 'zod'

export const ConfigScopeSchema = z.enum(['de_facto', 'local', 'global'])

export const OutputFormatSchema = z.enum(['text', 'json'])
export type OutputFormat = z.infer<typeof OutputFormatSchema>

export const GitSettingsSchema = z
  .object({
    binary: z.string().min(1),
    /** File used as the global scope instead of `git config --global` */
    global_config: z.string().min(1).optional(),
  })
  .strict()

export const DefaultsSettingsSchema = z
  .object({
    where: ConfigScopeSchema,
  })
  .strict()

export const OutputSettingsSchema = z
  .object({
    format: OutputFormatSchema,
  })
  .strict()

export const GitScopeSettingsSchema = z
  .object({
    git: GitSettingsSchema,
    defaults: DefaultsSettingsSchema,
    output: OutputSettingsSchema,
  })
  .strict()

export type GitScopeSettings = z.infer<typeof GitScopeSettingsSchema>

/** Settings as found in a file or env overlay: every field optional */
export const PartialGitScopeSettingsSchema = z
  .object({
    git: GitSettingsSchema.partial().optional(),
    defaults: DefaultsSettingsSchema.partial().optional(),
    output: OutputSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialGitScopeSettings = z.infer<typeof PartialGitScopeSettingsSchema>
