export {
  ArithmeticError,
  AuthorizationError,
  ExecutionError,
  RunnerError,
  StateError,
  TransferError,
  ValidationError,
} from './errors';
export { hashObject, stableStringify } from './hash';
export { Ledger } from './ledger';
export type { LedgerIntegrityReport } from './ledger';
export { RunnerKernel, systemClock } from './kernel';
export type { ExecutionResult, OperationCost, RunnerKernelOptions } from './kernel';
export { RunnerRuntime } from './runtime';
export type { RunnerRuntimeOptions } from './runtime';
export { RunnerFileStore, RUNNER_CHECKPOINT_VERSION } from './store';
export type { RunnerCheckpoint } from './store';
export { RunnerState } from './state';
export type { OperationSnapshot, StateSnapshot, StorageMetrics } from './state';
export { computeReward } from './accrual';
export { nextExecutionAfter } from './recurring';
export { GrantedAuthorizer, NO_AUTHORITY, grant } from './auth';
export type { Authorizer } from './auth';
export { InMemoryTokenLedger } from './tokens';
export type { BalanceChange, TokenBalanceSnapshot, TokenLedger, TransferPrimitive } from './tokens';
export { Notifier, validateNotification } from './notifier';
export { InMemorySignerRegistry, SecurityEngine } from './security';
export type { RunnerSecurity, SecurityConfig, SignerRegistry } from './security';
export { DEFAULT_STORE_PATH, loadRunnerConfig, parseRunnerConfig } from './config-loader';
export type { LoadedRunnerConfig } from './config-loader';
export { loadOperationFile, parseOperation } from './operation-loader';
export type { LoadedOperation } from './operation-loader';
export { createSignerKeyPair, signOperation } from './signing';
export type { SignerKeyPair } from './signing';
export { RunnerMaintenance } from './maintenance';
export type { MaintenanceFailure, MaintenanceResult } from './maintenance';
export { createConsoleLogger, silentLogger, LOG_LEVELS } from './logger';
export type { LogLevel, RunnerLogger } from './logger';
export { CUSTODY_ACCOUNT_ID, LARGE_MINT_THRESHOLD, MAX_MINT_BATCH_SIZE, SECONDS_PER_DAY } from './constants';
