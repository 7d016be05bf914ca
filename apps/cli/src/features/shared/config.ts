import { CredentialMissingError } from '@sol-ledger/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

// Blank values in .env files count as unset
const blankAsUndefined = (val: unknown) => (typeof val === 'string' && val.trim() === '' ? undefined : val);

export const HeliusEnvSchema = z.object({
  HELIUS_API_KEY: z.preprocess(blankAsUndefined, z.string().trim().optional()),
  HELIUS_BASE_URL: z.preprocess(blankAsUndefined, z.string().trim().url('HELIUS_BASE_URL must be a valid URL').optional()),
});

export interface HeliusConfig {
  apiKey: string;
  baseUrl?: string | undefined;
}

/**
 * Read the Helius credential and endpoint from the environment
 * (`.env` has already been merged into it by env-setup).
 */
export function loadHeliusConfig(env: NodeJS.ProcessEnv): Result<HeliusConfig, Error> {
  const parsed = HeliusEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
    return err(new Error(`Invalid configuration: ${issues}`));
  }

  const { HELIUS_API_KEY: apiKey, HELIUS_BASE_URL: baseUrl } = parsed.data;
  if (!apiKey) {
    return err(new CredentialMissingError('HELIUS_API_KEY'));
  }

  return ok({ apiKey, baseUrl });
}
