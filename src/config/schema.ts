import { z } from 'zod';

// ── Alias names and override fields ─────────────────────────────────

export const ALIAS_PATTERN = /^[0-9]+\.[0-9]+\.[0-9]+$/;

const noSeparators = (value: string) => !/[\t\r\n]/.test(value);

export const AliasNameSchema = z
  .string()
  .regex(ALIAS_PATTERN, 'Patch alias must look like MAJOR.MINOR.PATCH');

export const OverrideTargetSchema = z
  .string()
  .min(1, 'Override target must not be empty')
  .refine(noSeparators, 'Override target must not contain tabs or newlines');

export const OverrideEntrySchema = z.object({
  alias: AliasNameSchema,
  target: OverrideTargetSchema,
});

export type OverrideEntry = z.infer<typeof OverrideEntrySchema>;

// ── Settings (config.yaml) ──────────────────────────────────────────

// A key left blank in YAML loads as null; treat it as unset.
const unlessBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === null ? undefined : value), schema.optional());

export const SettingsSchema = z.object({
  prefix: unlessBlank(
    z
      .string()
      .min(1)
      .refine((v) => !v.includes('/'), 'Prefix must not contain a path separator'),
  ),
  managed_root: unlessBlank(z.string().min(1)),
  probe_timeout_ms: unlessBlank(z.coerce.number().int().positive()),
  rehash_command: unlessBlank(z.union([z.string().min(1), z.array(z.string().min(1)).min(1)])),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const SETTINGS_KEYS = SettingsSchema.keyof().options;

export type SettingsKey = (typeof SETTINGS_KEYS)[number];
