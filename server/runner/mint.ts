import { BatchMintInput, BatchMintMetrics, BatchMintResult, MintRequest, MintResult, MintStats } from '../../shared/schema';
import { assertPrincipal, checkedAdd } from './arithmetic';
import { requireConfig } from './config';
import { LARGE_MINT_THRESHOLD, MAX_MINT_BATCH_SIZE } from './constants';
import { EngineDependencies, OperationContext } from './context';
import { AuthorizationError, ValidationError } from './errors';

const EMPTY_STATS: MintStats = { total_minted: 0, total_batches_processed: 0, last_batch_id: 0 };

function classifyRequest(request: MintRequest): MintResult {
  if (!Number.isInteger(request.amount) || request.amount <= 0) {
    return { status: 'FAILURE', recipient: request.recipient, amount: request.amount, code: 'INVALID_AMOUNT' };
  }
  if (request.amount > Number.MAX_SAFE_INTEGER) {
    return { status: 'FAILURE', recipient: request.recipient, amount: request.amount, code: 'AMOUNT_OUT_OF_RANGE' };
  }
  if (typeof request.recipient !== 'string' || request.recipient.trim().length === 0) {
    return { status: 'FAILURE', recipient: request.recipient, amount: request.amount, code: 'INVALID_RECIPIENT' };
  }
  return { status: 'SUCCESS', recipient: request.recipient, amount: request.amount };
}

/**
 * Admin-only issuance of the configured token. Invalid requests are reported
 * per entry and do not fail the batch; statistics are written once per call.
 */
export class BatchMintEngine {
  constructor(private deps: EngineDependencies) {}

  batchMint(input: BatchMintInput, ctx: OperationContext): BatchMintResult {
    assertPrincipal(input.admin, 'admin');
    ctx.auth.requireAuth(input.admin);

    const config = requireConfig(this.deps.state);
    if (config.admin !== input.admin) {
      throw new AuthorizationError('caller is not the runner admin');
    }
    if (input.requests.length === 0 || input.requests.length > MAX_MINT_BATCH_SIZE) {
      throw new ValidationError(`batch must contain between 1 and ${MAX_MINT_BATCH_SIZE} requests`, {
        requests: input.requests.length,
      });
    }

    const stats = this.deps.state.getMintStats() ?? EMPTY_STATS;
    const batchId = checkedAdd(stats.last_batch_id, 1, 'batch id');

    const results: MintResult[] = [];
    let successful = 0;
    let totalAmount = 0;
    let largeMints = 0;

    for (const request of input.requests) {
      const result = classifyRequest(request);
      if (result.status === 'SUCCESS') {
        totalAmount = checkedAdd(totalAmount, result.amount, 'batch mint total');
        this.deps.tokens.mint(config.token, result.recipient, result.amount);
        successful += 1;
        if (result.amount >= LARGE_MINT_THRESHOLD) {
          largeMints += 1;
        }
      }
      results.push(result);
    }

    const failed = input.requests.length - successful;
    this.deps.state.setMintStats({
      total_minted: checkedAdd(stats.total_minted, totalAmount, 'total minted'),
      total_batches_processed: checkedAdd(stats.total_batches_processed, 1, 'batches processed'),
      last_batch_id: batchId,
    });

    this.deps.notifier.publish(
      {
        family: 'MINT',
        operation: 'BATCH_MINTED',
        payload: {
          batch_id: batchId,
          total_requests: input.requests.length,
          successful,
          failed,
          total_amount: totalAmount,
          large_mints: largeMints,
          timestamp: ctx.now,
        },
      },
      ctx.now,
    );

    const metrics: BatchMintMetrics = {
      total_requests: input.requests.length,
      successful_mints: successful,
      failed_mints: failed,
      total_amount_minted: totalAmount,
      avg_mint_amount: successful > 0 ? Math.floor(totalAmount / successful) : 0,
      large_mints: largeMints,
    };

    return {
      batch_id: batchId,
      token: config.token,
      total_requests: input.requests.length,
      successful,
      failed,
      results,
      metrics,
    };
  }

  getMintStats(): MintStats {
    return this.deps.state.getMintStats() ?? { ...EMPTY_STATS };
  }
}
