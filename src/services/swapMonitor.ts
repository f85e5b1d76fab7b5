import { BridgeClient, SwapRecord } from '../types';
import { describeError, isGasOptimizerError } from '../utils/errors';
import { logger } from '../utils/logger';
import { SwapOrchestrator } from './swapOrchestrator';

export interface ReconcileResult {
  checked: number;
  completed: string[];
  failed: string[];
  errors: { swapId: string; error: string }[];
}

/**
 * Watches in-flight bridge transfers and settles swaps whose transfers have
 * finished. The destination swap itself is reported by the executor through
 * `handleDestinationSwap`; only bridge outcomes are handled here.
 */
export class SwapMonitor {
  private isRunning = false;

  constructor(
    private readonly orchestrator: SwapOrchestrator,
    private readonly bridge: BridgeClient
  ) {}

  async reconcile(): Promise<ReconcileResult> {
    const result: ReconcileResult = { checked: 0, completed: [], failed: [], errors: [] };
    if (this.isRunning) {
      logger.warn('Swap reconciliation already in progress, skipping...');
      return result;
    }

    this.isRunning = true;
    try {
      for (const record of this.orchestrator.listActiveSwaps()) {
        const referenceId = this.trackedReference(record);
        if (!referenceId) {
          continue;
        }
        result.checked += 1;

        try {
          await this.reconcileSwap(record, referenceId, result);
        } catch (error) {
          if (isGasOptimizerError(error, 'InvalidStateTransition') || isGasOptimizerError(error, 'SwapNotActive')) {
            // settled by another caller between the read and the transition
            logger.warn(`Swap ${record.swapId} changed state during reconciliation: ${describeError(error)}`);
            continue;
          }
          logger.error(`Failed to reconcile swap ${record.swapId}: ${describeError(error)}`);
          result.errors.push({ swapId: record.swapId, error: describeError(error) });
        }
      }

      if (result.checked > 0) {
        logger.info('Swap reconciliation finished', {
          checked: result.checked,
          completed: result.completed.length,
          failed: result.failed.length,
          errors: result.errors.length,
        });
      }
      return result;
    } finally {
      this.isRunning = false;
    }
  }

  private trackedReference(record: SwapRecord): string | undefined {
    if (record.status === 'Bridging' && record.bridgeReferenceId) {
      return record.bridgeReferenceId;
    }
    if (record.status === 'BridgingBack' && record.returnBridgeReferenceId) {
      return record.returnBridgeReferenceId;
    }
    return undefined;
  }

  private async reconcileSwap(record: SwapRecord, referenceId: string, result: ReconcileResult): Promise<void> {
    const status = await this.bridge.status(referenceId);

    if (status.failed) {
      const leg = record.status === 'Bridging' ? 'outbound' : 'return';
      await this.orchestrator.fail(record.swapId, `${leg} bridge transfer ${referenceId} failed`);
      result.failed.push(record.swapId);
      return;
    }

    if (status.completed && record.status === 'BridgingBack') {
      await this.orchestrator.complete(record.swapId);
      result.completed.push(record.swapId);
    }
  }
}
