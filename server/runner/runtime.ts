import { Ledger } from './ledger';
import { RunnerKernel, RunnerKernelOptions } from './kernel';
import { RunnerState } from './state';
import { RunnerCheckpoint, RunnerFileStore, RUNNER_CHECKPOINT_VERSION } from './store';
import { InMemoryTokenLedger } from './tokens';

export interface RunnerRuntimeOptions extends Omit<RunnerKernelOptions, 'tokens'> {
  checkpointVersion?: string;
}

/** Owns one ledger, one record store and one token ledger, and moves them to and from checkpoints. */
export class RunnerRuntime {
  readonly ledger: Ledger;
  readonly state: RunnerState;
  readonly tokens: InMemoryTokenLedger;
  readonly kernel: RunnerKernel;
  private checkpointVersion: string;

  constructor(
    ledger?: Ledger,
    state?: RunnerState,
    tokens?: InMemoryTokenLedger,
    options?: RunnerRuntimeOptions,
  ) {
    this.ledger = ledger ?? new Ledger();
    this.state = state ?? new RunnerState();
    this.tokens = tokens ?? new InMemoryTokenLedger();
    this.kernel = new RunnerKernel(this.ledger, this.state, { ...options, tokens: this.tokens });
    this.checkpointVersion = options?.checkpointVersion ?? RUNNER_CHECKPOINT_VERSION;
  }

  createCheckpoint(): RunnerCheckpoint {
    return {
      version: this.checkpointVersion,
      saved_at: new Date().toISOString(),
      ledger: this.ledger.getEvents(),
      state: this.state.snapshot(),
      tokens: this.tokens.snapshot(),
    };
  }

  async saveToStore(store: RunnerFileStore): Promise<void> {
    await store.save(this.createCheckpoint());
  }

  static async loadFromStore(
    store: RunnerFileStore,
    options?: RunnerRuntimeOptions,
  ): Promise<RunnerRuntime> {
    const checkpoint = await store.load();
    if (!checkpoint) {
      return new RunnerRuntime(undefined, undefined, undefined, options);
    }

    store.validateLedgerIntegrity(checkpoint);
    return RunnerRuntime.fromCheckpoint(checkpoint, options);
  }

  static fromCheckpoint(
    checkpoint: RunnerCheckpoint,
    options?: RunnerRuntimeOptions,
  ): RunnerRuntime {
    return new RunnerRuntime(
      new Ledger(checkpoint.ledger),
      new RunnerState(checkpoint.state),
      new InMemoryTokenLedger(checkpoint.tokens),
      options,
    );
  }
}
