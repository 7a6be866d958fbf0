import { z } from 'zod';

// ── Actions ─────────────────────────────────────────────────────────

const idPattern = /^\S+$/;

export const ActionObjectSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  })
  .strict();

export const ActionSchema = z.union([z.string().min(1), ActionObjectSchema]);

// ── Components ──────────────────────────────────────────────────────

export const ComponentEntrySchema = z
  .object({
    id: z.string().min(1).regex(idPattern, 'Must not contain whitespace'),
    name: z.string().min(1),
    description: z.string().default(''),
    depends_on: z.array(z.string()).default([]),
    check_command: ActionSchema.optional(),
    install_action: ActionSchema,
    default: z.boolean().default(false),
    timeout: z.number().int().positive().optional(),
    env: z.record(z.string(), z.string()).default({}),
  })
  .strict();

export const RegistryFileSchema = z.object({
  components: z.array(ComponentEntrySchema),
});

// ── Settings ────────────────────────────────────────────────────────

export const SettingsSchema = z
  .object({
    registry: z.string().optional(),
    concurrency: z.number().int().min(1).max(64).optional(),
    fail_fast: z.boolean().optional(),
    grace_period: z.number().nonnegative().optional(),
    install_timeout: z.number().int().nonnegative().optional(),
    probe_timeout: z.number().int().positive().optional(),
    log_dir: z.string().optional(),
  })
  .strict();

export type SettingKey = keyof z.infer<typeof SettingsSchema>;

export const SETTING_KEYS: readonly SettingKey[] = SettingsSchema.keyof().options;
