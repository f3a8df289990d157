/**
 * Zod schema for .sealstack/config.yaml.
 */
import { z } from 'zod';

/**
 * Optional object field that still applies its inner defaults.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

const SearchSettingsSchema = z.object({
  /** Result cap when a caller passes no limit */
  limit: z.number().int().positive().default(20),
});

const AssemblySettingsSchema = z.object({
  /** Entity substituted when a query names none */
  default_entity: z.string().min(1).default('item'),
});

export const ConfigSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).default('1.0'),
  /** Pattern table path; the bundled table when unset */
  patterns: z.string().min(1).optional(),
  /** Vocabulary path, or "none" to disable; the bundled vocabulary when unset */
  vocabulary: z.string().min(1).optional(),
  logging: withDefaults(LoggingSettingsSchema),
  search: withDefaults(SearchSettingsSchema),
  assembly: withDefaults(AssemblySettingsSchema),
});

export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
export type AssemblySettings = z.infer<typeof AssemblySettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
