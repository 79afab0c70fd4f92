/**
 * Batch Coordinator
 *
 * Runs several single exchanges in one call. Items are processed in input
 * order; a failing item becomes a failure result and never aborts the batch
 * or unwinds earlier items.
 */

import { ValidationError, describeError, isRecyclerError } from '../errors.js';
import type { RecyclerEvents } from '../events/recycler-events.js';
import type { ExchangeGuard } from '../recycling/exchange-guard.js';
import type { RecycleProcessor } from '../recycling/recycle-processor.js';
import { MAX_BATCH_SIZE } from './batch-types.js';
import type {
  BatchItemFailure,
  BatchItemResult,
  BatchOutcome,
  RecycleBatchParams,
} from './batch-types.js';

export class BatchCoordinator {
  constructor(
    private readonly processor: RecycleProcessor,
    private readonly guard: ExchangeGuard,
    private readonly events: RecyclerEvents
  ) {}

  /**
   * @throws {PausedError} While recycling is paused
   * @throws {ValidationError} On mismatched lengths, an empty batch or more than MAX_BATCH_SIZE items
   */
  async recycleBatch(params: RecycleBatchParams): Promise<BatchOutcome> {
    return this.guard.run('recycleBatch', () => this.processItems(params), { acceptsItems: true });
  }

  private async processItems(params: RecycleBatchParams): Promise<BatchOutcome> {
    this.processor.assertNotPaused();
    validateShape(params);

    const results: BatchItemResult[] = [];
    let totalPoints = 0;

    for (let index = 0; index < params.classIds.length; index++) {
      const result = await this.processItem(params, index);
      if (result.status === 'succeeded') {
        totalPoints += result.points;
      } else {
        this.events.emit({
          type: 'recycling.failed',
          actor: params.actor,
          classId: result.classId,
          unitId: result.unitId,
          reason: result.reason,
          code: result.code,
        });
      }
      results.push(result);
    }

    const succeeded = results.filter((r) => r.status === 'succeeded').length;
    return {
      totalPoints,
      succeeded,
      failed: results.length - succeeded,
      results,
    };
  }

  private async processItem(params: RecycleBatchParams, index: number): Promise<BatchItemResult> {
    const classId = params.classIds[index] ?? '';
    const unitId = params.unitIds[index] ?? '';
    const method = params.useDestruction[index] ? 'destruction' : 'transfer';

    try {
      const record = await this.processor.recycleBatchItem(index, {
        actor: params.actor,
        classId,
        unitId,
        method,
      });
      return {
        status: 'succeeded',
        index,
        classId,
        unitId,
        points: record.pointsGenerated,
        record,
      };
    } catch (error) {
      return toFailure(index, classId, unitId, error);
    }
  }
}

function validateShape(params: RecycleBatchParams): void {
  const count = params.classIds.length;
  if (params.unitIds.length !== count || params.useDestruction.length !== count) {
    throw new ValidationError(
      `Batch arrays must have equal length (classIds ${count}, unitIds ${params.unitIds.length}, useDestruction ${params.useDestruction.length})`
    );
  }
  if (count === 0) {
    throw new ValidationError('Batch must contain at least one item');
  }
  if (count > MAX_BATCH_SIZE) {
    throw new ValidationError(`Batch size ${count} exceeds the maximum of ${MAX_BATCH_SIZE}`);
  }
}

function toFailure(
  index: number,
  classId: string,
  unitId: string,
  error: unknown
): BatchItemFailure {
  return {
    status: 'failed',
    index,
    classId,
    unitId,
    reason: describeError(error),
    code: isRecyclerError(error) ? error.code : 'UNEXPECTED_ERROR',
  };
}
