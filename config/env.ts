import { z } from 'zod';
import { ConfigError } from '../src/leyning/errors';
import { DEFAULT_OFFICIANT } from '../src/leyning/layout';

const DEFAULT_LEYNING_URL = 'https://www.hebcal.com/leyning';
const DEFAULT_CREDENTIALS_FILE = 'credentials.json';
const DEFAULT_SHEETS_DELAY_MS = 1000;

function clean(value: string | undefined | null): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

const LeyningEnvSchema = z.object({
  leyningUrl: z.string().url(),
  credentialsFile: z.string().min(1),
  clientEmail: z.string().email().optional(),
  privateKey: z.string().min(1).optional(),
  sheetsDelayMs: z.coerce.number().int().min(0),
  officiant: z.string().min(1),
});

export type LeyningEnvConfig = z.infer<typeof LeyningEnvSchema>;

type EnvSource = Record<string, string | undefined>;

export function resolveLeyningEnv(env: EnvSource = process.env): LeyningEnvConfig {
  const parsed = LeyningEnvSchema.safeParse({
    leyningUrl: clean(env.HEBCAL_LEYNING_URL) || DEFAULT_LEYNING_URL,
    credentialsFile:
      clean(env.GOOGLE_APPLICATION_CREDENTIALS) || clean(env.GOOGLE_CREDENTIALS_FILE) || DEFAULT_CREDENTIALS_FILE,
    clientEmail: clean(env.GOOGLE_CLIENT_EMAIL),
    privateKey: clean(env.GOOGLE_PRIVATE_KEY),
    sheetsDelayMs: clean(env.SHEETS_DELAY_MS) ?? DEFAULT_SHEETS_DELAY_MS,
    officiant: clean(env.LEYNING_OFFICIANT) || DEFAULT_OFFICIANT,
  });

  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration (${fields})`);
  }

  if (parsed.data.privateKey && !parsed.data.clientEmail) {
    throw new ConfigError('GOOGLE_PRIVATE_KEY is set but GOOGLE_CLIENT_EMAIL is missing');
  }

  return parsed.data;
}
