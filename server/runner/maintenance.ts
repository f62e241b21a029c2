import { Notification } from '../../shared/notifications';
import { PaymentExecution } from '../../shared/schema';
import { RunnerError } from './errors';
import { RunnerKernel } from './kernel';
import { RunnerLogger, silentLogger } from './logger';

export interface MaintenanceFailure {
  payment_id: number;
  code: string;
  error: string;
}

export interface MaintenanceResult {
  due_payments: number;
  executed: PaymentExecution[];
  failures: MaintenanceFailure[];
  events: Notification[];
}

/**
 * Executes every active recurring payment that is due. Each payment is its
 * own kernel operation, so one failing transfer leaves the others applied.
 */
export class RunnerMaintenance {
  constructor(private kernel: RunnerKernel, private logger: RunnerLogger = silentLogger) {}

  run(): MaintenanceResult {
    const due = this.kernel.duePayments();
    const executed: PaymentExecution[] = [];
    const failures: MaintenanceFailure[] = [];
    const events: Notification[] = [];

    for (const paymentId of due) {
      try {
        const result = this.kernel.executePayment({ payment_id: paymentId });
        executed.push(result.value);
        if (result.notification) {
          events.push(result.notification);
        }
      } catch (error) {
        if (!(error instanceof RunnerError)) {
          throw error;
        }
        failures.push({ payment_id: paymentId, code: error.code, error: error.message });
      }
    }

    if (failures.length > 0) {
      this.logger.warn(`maintenance: ${failures.length} of ${due.length} due payments failed`, failures);
    } else {
      this.logger.info(`maintenance: executed ${executed.length} due payments`);
    }

    return { due_payments: due.length, executed, failures, events };
  }
}
