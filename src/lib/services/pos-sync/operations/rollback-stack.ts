/**
 * Rollback Stack
 * ==============
 *
 * Compensating actions for a multi-step POS operation. Each step that
 * succeeds pushes its compensation; on a later failure they run in reverse.
 * A compensation that fails is appended to the failed rollback log for an
 * operator and is never retried here.
 */

import { errorMessage } from '../../../errors';
import { log } from '../../../utils/log';
import type { CompensationKind, FailedRollback, FailedRollbackLog } from '../../lineage/repository';

export interface Compensation {
  kind: CompensationKind;
  payload: Record<string, string>;
  run: () => Promise<void>;
}

export interface RollbackReport {
  compensated: number;
  failed: FailedRollback[];
}

export class RollbackStack {
  private readonly steps: Compensation[] = [];

  constructor(
    private readonly operationId: string,
    private readonly packId: string,
    private readonly failedRollbacks: FailedRollbackLog,
    private readonly clock: () => Date = () => new Date()
  ) {}

  push(compensation: Compensation): void {
    this.steps.push(compensation);
  }

  get size(): number {
    return this.steps.length;
  }

  /** Forget the compensations once the operation has committed */
  clear(): void {
    this.steps.length = 0;
  }

  async unwind(cause: unknown): Promise<RollbackReport> {
    log.warn(`🔄 Rolling back ${this.steps.length} step(s) of operation ${this.operationId}: ${errorMessage(cause)}`);
    const report: RollbackReport = { compensated: 0, failed: [] };

    while (this.steps.length > 0) {
      const step = this.steps.pop();
      if (!step) break;

      try {
        await step.run();
        report.compensated++;
      } catch (error) {
        log.error(`❌ Compensation ${step.kind} failed for pack ${this.packId}:`, error);
        report.failed.push(
          await this.failedRollbacks.appendFailedRollback({
            operationId: this.operationId,
            packId: this.packId,
            action: step.kind,
            payload: step.payload,
            error: errorMessage(error),
            createdAt: this.clock(),
          })
        );
      }
    }

    return report;
  }
}
