import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

export const DEFAULT_API_URL = 'https://api.adsabs.harvard.edu/v1';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const envSchema = z.object({
  ADS_API_TOKEN: optionalString,
  ADS_DEV_KEY: optionalString,
  ADS_API_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url('ADS_API_URL must be a URL').default(DEFAULT_API_URL)
  ),
  ADS_TIMEOUT_MS: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().default(30_000)
  ),
  ADS_SANDBOX: z
    .enum(['true', 'false', '1', '0', ''])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

export interface AdsConfig {
  token?: string;
  apiUrl: string;
  timeoutMs: number;
  sandbox: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AdsConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid environment configuration: ${fields}`, {
      cause: parsed.error,
    });
  }

  return {
    token: parsed.data.ADS_API_TOKEN ?? parsed.data.ADS_DEV_KEY,
    apiUrl: parsed.data.ADS_API_URL.replace(/\/+$/, ''),
    timeoutMs: parsed.data.ADS_TIMEOUT_MS,
    sandbox: parsed.data.ADS_SANDBOX,
  };
}

const TOKEN_FILES = ['dev_key', 'token'];

/**
 * Environment first, then the key files the ADS tooling keeps under `~/.ads`.
 */
export async function resolveToken(
  config: AdsConfig,
  homeDir: string = os.homedir()
): Promise<string | undefined> {
  if (config.token) return config.token;

  for (const name of TOKEN_FILES) {
    const filePath = path.join(homeDir, '.ads', name);
    let contents: string;
    try {
      contents = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) continue;
      throw error;
    }
    const token = contents.trim();
    if (token) return token;
  }

  return undefined;
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
