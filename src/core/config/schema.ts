/**
 * @arch codeout.core.domain.schema
 */
import { z } from 'zod';

/**
 * Make an object field optional and fill it with the schema's inner defaults
 * when missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Where artifacts land and how they are named. */
export const OutputSettingsSchema = z.object({
  /** Default directory, relative to the working directory */
  directory: z.string().min(1).default('tests'),
  /** Extension appended to the identifier, including the dot */
  extension: z.string().regex(/^\.[A-Za-z0-9.]+$/, 'must start with a dot').default('.ts'),
  /** Prefix of timestamp-derived identifiers */
  name_prefix: z.string().regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be a valid identifier').default('out'),
});

/** External formatter invocation. The artifact path is appended to args. */
export const FormatterSettingsSchema = z.object({
  command: z.string().min(1).default('prettier'),
  args: z.array(z.string()).default(['--write']),
});

/** Test runner the harness imports `test` from. */
export const HarnessRunnerSchema = z.enum(['vitest', 'node:test', 'globals']);

/** Harness wrapper settings. */
export const HarnessSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  runner: HarnessRunnerSchema.default('vitest'),
  /** Emit the lint-suppression line before the generated source */
  prelude: z.boolean().default(true),
});

/** Complete configuration schema. */
export const ConfigSchema = z.object({
  /** Master switch. Off means emit does nothing at all. */
  enabled: z.boolean().default(false),
  /** Run the external formatter after a successful write */
  formatted: z.boolean().default(true),
  /** Print a success line to stdout after a successful write */
  notification: z.boolean().default(true),
  output: withDefaults(OutputSettingsSchema),
  formatter: withDefaults(FormatterSettingsSchema),
  harness: withDefaults(HarnessSettingsSchema),
});

export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type FormatterSettings = z.infer<typeof FormatterSettingsSchema>;
export type HarnessRunner = z.infer<typeof HarnessRunnerSchema>;
export type HarnessSettings = z.infer<typeof HarnessSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/** Config as callers may write it: every field optional, sections partial. */
export interface PartialConfig {
  enabled?: boolean;
  formatted?: boolean;
  notification?: boolean;
  output?: Partial<OutputSettings>;
  formatter?: Partial<FormatterSettings>;
  harness?: Partial<HarnessSettings>;
}
