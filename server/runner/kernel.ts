import { Notification } from '../../shared/notifications';
import {
  BatchMintInput,
  BatchMintResult,
  BatchSettlement,
  CreatePaymentInput,
  DistributeRewardsInput,
  EscrowEntry,
  EscrowLockInput,
  EscrowReleaseInput,
  InitializeInput,
  MintStats,
  OperationOutput,
  PaymentCreated,
  PaymentExecution,
  PaymentRefInput,
  RecurringPayment,
  RunnerConfig,
  RunnerOperation,
  SetAdminInput,
  SignedOperation,
  StakeInput,
  StakeOutcome,
  UnstakeOutcome,
} from '../../shared/schema';
import { Authorizer, NO_AUTHORITY } from './auth';
import { BatchSettlementEngine } from './batch';
import { ConfigurationModule } from './config';
import { EngineDependencies, OperationContext } from './context';
import { EscrowEngine } from './escrow';
import { AuthorizationError, ExecutionError, RunnerError, ValidationError } from './errors';
import { Ledger } from './ledger';
import { RunnerLogger, silentLogger } from './logger';
import { BatchMintEngine } from './mint';
import { Notifier } from './notifier';
import { RecurringPaymentScheduler } from './recurring';
import { RunnerSecurity } from './security';
import { StakingEngine } from './stake';
import { RunnerState } from './state';
import { InMemoryTokenLedger, TokenLedger } from './tokens';

export interface RunnerKernelOptions {
  clock?: () => number;
  logger?: RunnerLogger;
  security?: RunnerSecurity;
  tokens?: TokenLedger;
}

export interface OperationCost {
  reads: number;
  writes: number;
  removes: number;
  has: number;
  notifications: number;
}

export interface ExecutionResult<T> {
  value: T;
  notification: Notification | null;
  cost: OperationCost;
}

export function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Runs every operation atomically: records, token balances and the
 * notification ledger are captured first and put back if anything throws.
 */
export class RunnerKernel {
  readonly tokens: TokenLedger;
  private clock: () => number;
  private logger: RunnerLogger;
  private security?: RunnerSecurity;

  private configuration: ConfigurationModule;
  private staking: StakingEngine;
  private batch: BatchSettlementEngine;
  private escrow: EscrowEngine;
  private recurring: RecurringPaymentScheduler;
  private minting: BatchMintEngine;

  constructor(
    private ledger: Ledger,
    private state: RunnerState,
    options?: RunnerKernelOptions,
  ) {
    this.tokens = options?.tokens ?? new InMemoryTokenLedger();
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? silentLogger;
    this.security = options?.security;

    const deps: EngineDependencies = {
      state: this.state,
      tokens: this.tokens,
      notifier: new Notifier(this.ledger),
    };
    this.configuration = new ConfigurationModule(deps);
    this.staking = new StakingEngine(deps);
    this.batch = new BatchSettlementEngine(deps);
    this.escrow = new EscrowEngine(deps);
    this.recurring = new RecurringPaymentScheduler(deps);
    this.minting = new BatchMintEngine(deps);
  }

  initialize(input: InitializeInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<RunnerConfig> {
    return this.run('INITIALIZE', (now) => this.configuration.initialize(input, { now, auth }));
  }

  setAdmin(input: SetAdminInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<RunnerConfig> {
    return this.run('SET_ADMIN', (now) => this.configuration.setAdmin(input, { now, auth }));
  }

  stake(input: StakeInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<StakeOutcome> {
    return this.run('STAKE', (now) => this.staking.stake(input, { now, auth }));
  }

  unstake(input: StakeInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<UnstakeOutcome> {
    return this.run('UNSTAKE', (now) => this.staking.unstake(input, { now, auth }));
  }

  distributeRewards(input: DistributeRewardsInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<BatchSettlement> {
    return this.run('DISTRIBUTE_REWARDS', (now) => this.batch.distributeRewards(input, { now, auth }));
  }

  lock(input: EscrowLockInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<EscrowEntry> {
    return this.run('ESCROW_LOCK', (now) => this.escrow.lock(input, { now, auth }));
  }

  release(input: EscrowReleaseInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<EscrowEntry> {
    return this.run('ESCROW_RELEASE', (now) => this.escrow.release(input, { now, auth }));
  }

  createPayment(input: CreatePaymentInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<PaymentCreated> {
    return this.run('PAYMENT_CREATE', (now) => this.recurring.createPayment(input, { now, auth }));
  }

  executePayment(input: PaymentRefInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<PaymentExecution> {
    return this.run('PAYMENT_EXECUTE', (now) => this.recurring.executePayment(input, { now, auth }));
  }

  cancelPayment(input: PaymentRefInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<RecurringPayment> {
    return this.run('PAYMENT_CANCEL', (now) => this.recurring.cancelPayment(input, { now, auth }));
  }

  batchMint(input: BatchMintInput, auth: Authorizer = NO_AUTHORITY): ExecutionResult<BatchMintResult> {
    return this.run('BATCH_MINT', (now) => this.minting.batchMint(input, { now, auth }));
  }

  /**
   * Entry point for operations that arrive as data. When the security engine
   * requires signatures, only `executeSigned` is accepted here.
   */
  execute(operation: RunnerOperation, auth: Authorizer = NO_AUTHORITY): ExecutionResult<OperationOutput> {
    if (this.security?.requiresSignature) {
      throw new AuthorizationError('operation must be signed');
    }
    return this.run(operation.kind, (now) => this.dispatch(operation, { now, auth }));
  }

  executeSigned(signed: SignedOperation): ExecutionResult<OperationOutput> {
    const security = this.security;
    if (!security) {
      throw new ValidationError('signed operations need a security engine');
    }
    return this.run(signed.operation.kind, (now) => {
      const auth = security.authorize(signed, { state: this.state, now });
      return this.dispatch(signed.operation, { now, auth });
    });
  }

  getConfig(): RunnerConfig | null {
    return this.state.getConfig() ?? null;
  }

  getStake(account: string): number {
    return this.staking.getStake(account);
  }

  previewRewards(stakers: string[]): number[] {
    return this.batch.previewRewards(stakers, this.clock());
  }

  getEscrow(depositor: string, escrowId: number): EscrowEntry | null {
    return this.escrow.getEscrow(depositor, escrowId);
  }

  getPayment(paymentId: number): RecurringPayment {
    return this.recurring.getPayment(paymentId);
  }

  duePayments(now: number = this.clock()): number[] {
    return this.recurring.listDuePayments(now);
  }

  getMintStats(): MintStats {
    return this.minting.getMintStats();
  }

  private dispatch(operation: RunnerOperation, ctx: OperationContext): OperationOutput {
    switch (operation.kind) {
      case 'INITIALIZE':
        return this.configuration.initialize(operation, ctx);
      case 'SET_ADMIN':
        return this.configuration.setAdmin(operation, ctx);
      case 'STAKE':
        return this.staking.stake(operation, ctx);
      case 'UNSTAKE':
        return this.staking.unstake(operation, ctx);
      case 'DISTRIBUTE_REWARDS':
        return this.batch.distributeRewards(operation, ctx);
      case 'ESCROW_LOCK':
        return this.escrow.lock(operation, ctx);
      case 'ESCROW_RELEASE':
        return this.escrow.release(operation, ctx);
      case 'PAYMENT_CREATE':
        return this.recurring.createPayment(operation, ctx);
      case 'PAYMENT_EXECUTE':
        return this.recurring.executePayment(operation, ctx);
      case 'PAYMENT_CANCEL':
        return this.recurring.cancelPayment(operation, ctx);
      case 'BATCH_MINT':
        return this.minting.batchMint(operation, ctx);
    }
  }

  private run<T>(label: string, fn: (now: number) => T): ExecutionResult<T> {
    const now = this.clock();
    const snapshot = this.state.beginOperation();
    const balances = this.tokens.snapshot();
    const ledgerLength = this.ledger.size();
    this.state.resetMetrics();

    try {
      const value = fn(now);
      const emitted = this.ledger.since(ledgerLength);
      const cost: OperationCost = { ...this.state.metrics(), notifications: emitted.length };
      this.logger.debug(`${label} accepted`, cost);
      return { value, notification: emitted[0] ?? null, cost };
    } catch (error) {
      this.state.rollbackOperation(snapshot);
      this.tokens.restore(balances);
      this.ledger.truncate(ledgerLength);

      const failure = error instanceof RunnerError ? error : new ExecutionError('runner execution failed', { error });
      this.logger.warn(`${label} rejected: ${failure.message}`, { code: failure.code, details: failure.details });
      throw failure;
    }
  }
}
