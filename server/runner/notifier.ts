import { ZodError, ZodTypeAny } from 'zod';
import {
  AdminChangedEventSchema,
  BatchMintedEventSchema,
  BatchSettledEventSchema,
  EscrowLockedEventSchema,
  EscrowReleasedEventSchema,
  InitializeEventSchema,
  Notification,
  NotificationBody,
  PaymentCanceledEventSchema,
  PaymentCreatedEventSchema,
  PaymentExecutedEventSchema,
  StakeEventSchema,
  UnstakeEventSchema,
} from '../../shared/notifications';
import { ValidationError } from './errors';
import { Ledger } from './ledger';

function schemaFor(body: NotificationBody): ZodTypeAny {
  switch (body.operation) {
    case 'INITIALIZE':
      return InitializeEventSchema;
    case 'ADMIN_CHANGED':
      return AdminChangedEventSchema;
    case 'STAKE':
      return StakeEventSchema;
    case 'UNSTAKE':
      return UnstakeEventSchema;
    case 'BATCH_SETTLED':
      return BatchSettledEventSchema;
    case 'ESCROW_LOCKED':
      return EscrowLockedEventSchema;
    case 'ESCROW_RELEASED':
      return EscrowReleasedEventSchema;
    case 'PAYMENT_CREATED':
      return PaymentCreatedEventSchema;
    case 'PAYMENT_EXECUTED':
      return PaymentExecutedEventSchema;
    case 'PAYMENT_CANCELED':
      return PaymentCanceledEventSchema;
    case 'BATCH_MINTED':
      return BatchMintedEventSchema;
  }
}

/** Throws `ValidationError` when the payload breaks its own invariants or carries undeclared fields. */
export function validateNotification(body: NotificationBody): void {
  const result = schemaFor(body).safeParse(body.payload);
  if (!result.success) {
    throw new ValidationError(
      `event validation: ${body.family}/${body.operation}: ${describeIssues(result.error)}`,
      result.error.issues,
    );
  }
}

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/** Validates and publishes notifications onto the ledger. */
export class Notifier {
  constructor(private ledger: Ledger) {}

  publish(body: NotificationBody, timestamp: number): Notification {
    validateNotification(body);
    return this.ledger.append(body, timestamp);
  }
}
