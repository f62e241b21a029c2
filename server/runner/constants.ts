/** Account that holds staked principal, the reward reserve, and escrowed funds. */
export const CUSTODY_ACCOUNT_ID = 'CUSTODY';

export const SECONDS_PER_DAY = 86_400;
export const SECONDS_PER_YEAR = 365 * SECONDS_PER_DAY;
export const BPS_DENOMINATOR = 10_000;
export const MAX_REWARD_RATE = 4_294_967_295;

export const MAX_MINT_BATCH_SIZE = 100;
export const LARGE_MINT_THRESHOLD = 1_000_000_000;
