import {
  CreatePaymentInput,
  PaymentCreated,
  PaymentExecution,
  PaymentRefInput,
  RecurringPayment,
} from '../../shared/schema';
import {
  assertNonNegativeInteger,
  assertPositiveAmount,
  assertPrincipal,
  assertUserPrincipal,
  checkedAdd,
  checkedMul,
} from './arithmetic';
import { EngineDependencies, OperationContext } from './context';
import { StateError } from './errors';

/**
 * Next due time after an execution at `now`. Every interval that has already
 * elapsed is skipped in one jump, so the result is strictly after `now`.
 *
 *   next + (floor((now - next) / interval) + 1) * interval
 */
export function nextExecutionAfter(
  nextExecution: number,
  interval: number,
  now: number,
): { next_execution: number; intervals_skipped: number } {
  const intervalsSkipped = Math.floor((now - nextExecution) / interval);
  const advance = checkedMul(intervalsSkipped + 1, interval, 'next_execution');
  return {
    next_execution: checkedAdd(nextExecution, advance, 'next_execution'),
    intervals_skipped: intervalsSkipped,
  };
}

export class RecurringPaymentScheduler {
  constructor(private deps: EngineDependencies) {}

  createPayment(input: CreatePaymentInput, ctx: OperationContext): PaymentCreated {
    assertUserPrincipal(input.sender, 'sender');
    ctx.auth.requireAuth(input.sender);

    assertUserPrincipal(input.recipient, 'recipient');
    assertPrincipal(input.token, 'token');
    assertPositiveAmount(input.amount, 'payment amount');
    assertPositiveAmount(input.interval, 'payment interval');
    assertNonNegativeInteger(input.start_time, 'start_time');

    const paymentId = checkedAdd(this.deps.state.getPaymentCount(), 1, 'payment count');
    const payment: RecurringPayment = {
      sender: input.sender,
      recipient: input.recipient,
      token: input.token,
      amount: input.amount,
      interval: input.interval,
      next_execution: input.start_time,
      active: true,
    };

    this.deps.state.setPayment(paymentId, payment);
    this.deps.state.setPaymentCount(paymentId);

    this.deps.notifier.publish(
      {
        family: 'RECURRING',
        operation: 'PAYMENT_CREATED',
        payload: {
          payment_id: paymentId,
          sender: payment.sender,
          recipient: payment.recipient,
          amount: payment.amount,
          interval: payment.interval,
          next_execution: payment.next_execution,
          timestamp: ctx.now,
        },
      },
      ctx.now,
    );

    return { payment_id: paymentId };
  }

  /** Anyone may trigger a due payment; exactly one transfer happens however late the call is. */
  executePayment(input: PaymentRefInput, ctx: OperationContext): PaymentExecution {
    const payment = this.requirePayment(input.payment_id);
    if (!payment.active) {
      throw new StateError(`payment is not active: ${input.payment_id}`);
    }
    if (ctx.now < payment.next_execution) {
      throw new StateError('too early for next execution', {
        next_execution: payment.next_execution,
        now: ctx.now,
      });
    }

    this.deps.tokens.transfer(payment.token, payment.sender, payment.recipient, payment.amount);

    const schedule = nextExecutionAfter(payment.next_execution, payment.interval, ctx.now);
    this.deps.state.setPayment(input.payment_id, { ...payment, next_execution: schedule.next_execution });

    this.deps.notifier.publish(
      {
        family: 'RECURRING',
        operation: 'PAYMENT_EXECUTED',
        payload: {
          payment_id: input.payment_id,
          amount: payment.amount,
          next_execution: schedule.next_execution,
          timestamp: ctx.now,
        },
      },
      ctx.now,
    );

    return {
      payment_id: input.payment_id,
      amount: payment.amount,
      next_execution: schedule.next_execution,
      intervals_skipped: schedule.intervals_skipped,
    };
  }

  cancelPayment(input: PaymentRefInput, ctx: OperationContext): RecurringPayment {
    const payment = this.requirePayment(input.payment_id);
    ctx.auth.requireAuth(payment.sender);

    if (!payment.active) {
      throw new StateError(`payment is already canceled: ${input.payment_id}`);
    }

    const canceled: RecurringPayment = { ...payment, active: false };
    this.deps.state.setPayment(input.payment_id, canceled);

    this.deps.notifier.publish(
      {
        family: 'RECURRING',
        operation: 'PAYMENT_CANCELED',
        payload: { payment_id: input.payment_id, sender: payment.sender, timestamp: ctx.now },
      },
      ctx.now,
    );

    return canceled;
  }

  getPayment(paymentId: number): RecurringPayment {
    return this.requirePayment(paymentId);
  }

  /** Ids of active payments due at `now`, in creation order. */
  listDuePayments(now: number): number[] {
    const due: number[] = [];
    const count = this.deps.state.getPaymentCount();
    for (let id = 1; id <= count; id += 1) {
      const payment = this.deps.state.getPayment(id);
      if (payment && payment.active && payment.next_execution <= now) {
        due.push(id);
      }
    }
    return due;
  }

  private requirePayment(paymentId: number): RecurringPayment {
    assertNonNegativeInteger(paymentId, 'payment_id');
    const payment = this.deps.state.getPayment(paymentId);
    if (!payment) {
      throw new StateError(`payment not found: ${paymentId}`);
    }
    return payment;
  }
}
