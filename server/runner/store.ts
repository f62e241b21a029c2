import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Notification } from '../../shared/notifications';
import { ValidationError } from './errors';
import { Ledger } from './ledger';
import { StateSnapshot } from './state';
import { TokenBalanceSnapshot } from './tokens';

export const RUNNER_CHECKPOINT_VERSION = '1.0.0';

export interface RunnerCheckpoint {
  version: string;
  saved_at: string;
  ledger: Notification[];
  state: StateSnapshot;
  tokens: TokenBalanceSnapshot;
}

/** One JSON file holding the whole runner; writes go through a temp file and a rename. */
export class RunnerFileStore {
  constructor(private filePath: string) {}

  async load(): Promise<RunnerCheckpoint | null> {
    try {
      const raw = await readFile(this.filePath, 'utf8');
      const parsed: unknown = JSON.parse(raw);
      assertValidCheckpoint(parsed);
      return parsed;
    } catch (error) {
      if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async save(checkpoint: RunnerCheckpoint): Promise<void> {
    assertValidCheckpoint(checkpoint);
    await mkdir(dirname(this.filePath), { recursive: true });

    const payload = JSON.stringify(checkpoint, null, 2);
    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, payload, 'utf8');
    await rm(this.filePath, { force: true });
    await rename(tempPath, this.filePath);
  }

  validateLedgerIntegrity(checkpoint: RunnerCheckpoint): void {
    const ledger = new Ledger(checkpoint.ledger);
    const report = ledger.verifyIntegrity();
    if (!report.ok) {
      throw new ValidationError('ledger integrity check failed', report.errors);
    }
  }
}

function assertValidCheckpoint(checkpoint: unknown): asserts checkpoint is RunnerCheckpoint {
  if (!checkpoint || typeof checkpoint !== 'object') {
    throw new ValidationError('checkpoint is required');
  }
  if (!('version' in checkpoint) || typeof checkpoint.version !== 'string' || !checkpoint.version) {
    throw new ValidationError('checkpoint version is required');
  }
  if (!('saved_at' in checkpoint) || typeof checkpoint.saved_at !== 'string' || !checkpoint.saved_at) {
    throw new ValidationError('checkpoint saved_at is required');
  }
  if (!('ledger' in checkpoint) || !Array.isArray(checkpoint.ledger)) {
    throw new ValidationError('checkpoint ledger must be an array');
  }
  if (!('state' in checkpoint) || !checkpoint.state || typeof checkpoint.state !== 'object') {
    throw new ValidationError('checkpoint state is required');
  }
  if (!('tokens' in checkpoint) || !checkpoint.tokens || typeof checkpoint.tokens !== 'object') {
    throw new ValidationError('checkpoint token balances are required');
  }
}
