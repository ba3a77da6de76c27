import { z } from 'zod';
import { ALIGN_DEFAULTS, ENV_KEYS } from './constants';
import { alignError } from './errors';

const LANG_CODE_RE = /^[a-z]{2,8}$/;

const langCode = (fallback: string) =>
  z.string().trim().toLowerCase().regex(LANG_CODE_RE, 'Expected a 2-8 letter language code').default(fallback);

export const alignConfigSchema = z
  .object({
    toleranceMs: z.number().int().nonnegative().default(ALIGN_DEFAULTS.TOLERANCE_MS),
    maxSyncRounds: z.number().int().min(1).max(100).default(ALIGN_DEFAULTS.MAX_SYNC_ROUNDS),
    concurrency: z.number().int().min(1).max(64).default(ALIGN_DEFAULTS.CONCURRENCY),
    primaryLang: langCode(ALIGN_DEFAULTS.PRIMARY_LANG),
    secondaryLang: langCode(ALIGN_DEFAULTS.SECONDARY_LANG),
  })
  .refine((config) => config.primaryLang !== config.secondaryLang, {
    message: 'primaryLang and secondaryLang must differ',
    path: ['secondaryLang'],
  });

export type AlignConfig = z.infer<typeof alignConfigSchema>;
export type AlignConfigInput = z.input<typeof alignConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

export function resolveAlignConfig(input: unknown = {}): AlignConfig {
  const parsed = alignConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw alignError('INVALID_CONFIG', `Invalid alignment config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string | undefined {
  const v = env[name];
  return v === undefined || v.trim() === '' ? undefined : v.trim();
}

function getNumberEnv(env: Env, name: string): number | undefined {
  const v = getEnv(env, name);
  return v === undefined ? undefined : Number(v);
}

/** Unset or empty variables fall back to the schema defaults. */
export function alignConfigFromEnv(env: Env = process.env): AlignConfig {
  return resolveAlignConfig({
    toleranceMs: getNumberEnv(env, ENV_KEYS.TOLERANCE_MS),
    maxSyncRounds: getNumberEnv(env, ENV_KEYS.MAX_SYNC_ROUNDS),
    concurrency: getNumberEnv(env, ENV_KEYS.CONCURRENCY),
    primaryLang: getEnv(env, ENV_KEYS.PRIMARY_LANG),
    secondaryLang: getEnv(env, ENV_KEYS.SECONDARY_LANG),
  });
}
