import { InitializeInput, RunnerConfig, SetAdminInput } from '../../shared/schema';
import { assertPositiveAmount, assertPrincipal, assertUserPrincipal } from './arithmetic';
import { MAX_REWARD_RATE } from './constants';
import { EngineDependencies, OperationContext } from './context';
import { AuthorizationError, StateError, ValidationError } from './errors';
import { RunnerState } from './state';

/** Reads the configuration by value; every operation that needs it calls this once. */
export function requireConfig(state: RunnerState): RunnerConfig {
  const config = state.getConfig();
  if (!config) {
    throw new StateError('runner not initialized');
  }
  return config;
}

export class ConfigurationModule {
  constructor(private deps: EngineDependencies) {}

  initialize(input: InitializeInput, ctx: OperationContext): RunnerConfig {
    assertUserPrincipal(input.admin, 'admin');
    ctx.auth.requireAuth(input.admin);

    if (this.deps.state.hasConfig()) {
      throw new StateError('runner already initialized');
    }

    assertPrincipal(input.token, 'token');
    assertPositiveAmount(input.min_stake, 'min_stake');
    if (!Number.isSafeInteger(input.reward_rate) || input.reward_rate <= 0 || input.reward_rate > MAX_REWARD_RATE) {
      throw new ValidationError(`reward_rate must be an integer between 1 and ${MAX_REWARD_RATE}`, {
        reward_rate: input.reward_rate,
      });
    }

    const config: RunnerConfig = {
      admin: input.admin,
      token: input.token,
      reward_rate: input.reward_rate,
      min_stake: input.min_stake,
      initialized_at: ctx.now,
    };
    this.deps.state.setConfig(config);

    this.deps.notifier.publish(
      {
        family: 'STAKING',
        operation: 'INITIALIZE',
        payload: {
          admin: config.admin,
          reward_rate: config.reward_rate,
          min_stake: config.min_stake,
          timestamp: ctx.now,
        },
      },
      ctx.now,
    );

    return config;
  }

  /** Hands the admin role to `new_admin`; only the current admin may do this. */
  setAdmin(input: SetAdminInput, ctx: OperationContext): RunnerConfig {
    assertPrincipal(input.admin, 'admin');
    ctx.auth.requireAuth(input.admin);

    const config = requireConfig(this.deps.state);
    if (config.admin !== input.admin) {
      throw new AuthorizationError('caller is not the runner admin');
    }
    assertUserPrincipal(input.new_admin, 'new_admin');

    const updated: RunnerConfig = { ...config, admin: input.new_admin };
    this.deps.state.setConfig(updated);

    this.deps.notifier.publish(
      {
        family: 'STAKING',
        operation: 'ADMIN_CHANGED',
        payload: { previous_admin: config.admin, new_admin: updated.admin, timestamp: ctx.now },
      },
      ctx.now,
    );

    return updated;
  }
}
