import { BridgeFeeSchedule, ChainConfig, ChainId, OptimizationThresholds, SwapRecord } from '../types';
import { logger } from '../utils/logger';
import { AccessControl, Capability } from './accessControl';
import { ChainRegistry } from './chainRegistry';
import { CostModel } from './costModel';
import { GasPriceKeeper } from './gasPriceKeeper';
import { SwapOrchestrator } from './swapOrchestrator';

/**
 * Operator-facing entry point. Holds the admin capability so callers never
 * handle it directly, and writes an audit line for every change.
 */
export class AdminService {
  constructor(
    private readonly admin: Capability,
    private readonly access: AccessControl,
    private readonly registry: ChainRegistry,
    private readonly costModel: CostModel,
    private readonly orchestrator: SwapOrchestrator,
    private readonly keeper: GasPriceKeeper
  ) {
    access.requireRole(admin, 'admin');
  }

  upsertChain(chain: ChainConfig): Readonly<ChainConfig> {
    this.audit('upsertChain', { chainId: chain.chainId });
    return this.registry.upsert(this.admin, chain);
  }

  setChainEnabled(chainId: ChainId, enabled: boolean): Readonly<ChainConfig> {
    this.audit('setChainEnabled', { chainId, enabled });
    return this.registry.setEnabled(this.admin, chainId, enabled);
  }

  setThresholds(thresholds: Partial<OptimizationThresholds>): OptimizationThresholds {
    this.audit('setThresholds', { ...thresholds });
    return this.orchestrator.setThresholds(this.admin, thresholds);
  }

  setPaused(paused: boolean): void {
    this.audit('setPaused', { paused });
    this.orchestrator.setPaused(this.admin, paused);
  }

  /** Issues a new keeper capability and hands it to the in-process keeper; the old one stops working. */
  rotateKeeper(holder: string): Capability {
    this.audit('rotateKeeper', { holder, previous: this.access.currentKeeper() });
    const next = this.access.rotateKeeper(this.admin, holder);
    this.keeper.setCapability(next);
    return next;
  }

  setBridgeFeeSchedule(schedule: BridgeFeeSchedule, chainId?: ChainId): void {
    this.audit('setBridgeFeeSchedule', { chainId: chainId ?? 'global', ...schedule });
    this.costModel.setBridgeFeeSchedule(this.admin, schedule, chainId);
  }

  recoverSwap(swapId: string): Promise<SwapRecord> {
    this.audit('recoverSwap', { swapId });
    return this.orchestrator.emergencyRecovery(swapId, this.admin);
  }

  retryRefund(swapId: string): Promise<SwapRecord> {
    this.audit('retryRefund', { swapId });
    return this.orchestrator.retryRefund(this.admin, swapId);
  }

  private audit(action: string, details: Record<string, unknown>): void {
    logger.info(`[ADMIN] ${action}`, { by: this.admin.holder, ...details });
  }
}
