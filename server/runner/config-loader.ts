import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ValidationError } from './errors';
import { LOG_LEVELS, LogLevel } from './logger';
import { InMemorySignerRegistry, SecurityConfig } from './security';

export const DEFAULT_STORE_PATH = 'data/runner-checkpoint.json';

const SignerEntrySchema = z.object({
  signer_id: z.string().min(1),
  public_key: z.string().min(1),
});

const RunnerFileConfigSchema = z
  .object({
    store_path: z.string().min(1).default(DEFAULT_STORE_PATH),
    log_level: z.enum(LOG_LEVELS).default('info'),
    security: z
      .object({
        require_signature: z.boolean().default(false),
        require_nonce: z.boolean().default(true),
        signers: z.array(SignerEntrySchema).default([]),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RunnerFileConfig = z.infer<typeof RunnerFileConfigSchema>;

export interface LoadedRunnerConfig {
  store_path: string;
  log_level: LogLevel;
  security: SecurityConfig;
  registry: InMemorySignerRegistry;
}

export function parseRunnerConfig(raw: unknown): LoadedRunnerConfig {
  const result = RunnerFileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('invalid runner configuration', result.error.issues);
  }

  const registry = new InMemorySignerRegistry();
  for (const signer of result.data.security.signers) {
    if (registry.getPublicKey(signer.signer_id)) {
      throw new ValidationError(`duplicate signer entry: ${signer.signer_id}`);
    }
    registry.registerSigner(signer.signer_id, signer.public_key);
  }

  return {
    store_path: result.data.store_path,
    log_level: result.data.log_level,
    security: {
      require_signature: result.data.security.require_signature,
      require_nonce: result.data.security.require_nonce,
    },
    registry,
  };
}

/** A missing file yields the defaults; anything else unreadable is an error. */
export async function loadRunnerConfig(filePath: string): Promise<LoadedRunnerConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      return parseRunnerConfig({});
    }
    throw error;
  }
  return parseRunnerConfig(raw);
}
