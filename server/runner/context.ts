import { Authorizer } from './auth';
import { Notifier } from './notifier';
import { RunnerState } from './state';
import { TokenLedger } from './tokens';

/** Per-operation inputs: one clock reading and the caller's proven authority. */
export interface OperationContext {
  now: number;
  auth: Authorizer;
}

export interface EngineDependencies {
  state: RunnerState;
  tokens: TokenLedger;
  notifier: Notifier;
}
