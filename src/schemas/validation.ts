import { z } from 'zod';

export const SESSION_STATE_VERSION = 1;

export const splitList = (value: string): string[] =>
  value.split(/\s+/).filter((entry) => entry.length > 0);

const ListEntrySchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value).trim());

// YAML lists, or a whitespace separated string as env vars provide
export const StringListSchema = z
  .union([z.array(ListEntrySchema), z.string().transform(splitList)])
  .transform((list) => list.filter((entry) => entry.length > 0));

export const BooleanSettingSchema = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes'),
]);

// Configuration file schema (.git-cc.yaml)
export const GitCcConfigSchema = z.object({
  use_defaults: BooleanSettingSchema.default(true),
  custom_commit_types: StringListSchema.default([]),
  scopes: StringListSchema.default([]),
});

export type ConfigKey = keyof typeof GitCcConfigSchema.shape;

export const CONFIG_ENV_VARS: Record<ConfigKey, string> = {
  use_defaults: 'USE_DEFAULTS',
  custom_commit_types: 'CUSTOM_COMMIT_TYPES',
  scopes: 'SCOPES',
};

// Session swap file schema. Every field falls back on its own so an older or
// partially written record still restores what it can.
export const SessionStateSchema = z.object({
  version: z.number().int().catch(SESSION_STATE_VERSION),
  commit_type: z.string().catch(''),
  scope: z.string().catch(''),
  short_description: z.string().catch(''),
  long_description: z.string().catch(''),
  breaking_change: z.boolean().catch(false),
  breaking_change_note: z.string().catch(''),
});

export type PersistedSessionState = z.infer<typeof SessionStateSchema>;
