import { v5 as uuidv5 } from 'uuid';
import {
  BridgeClient,
  BridgeTransferRequest,
  ChainId,
  Clock,
  DestinationSwapResult,
  InitiateSwapParams,
  InitiateSwapResult,
  OptimizationQuote,
  OptimizationThresholds,
  RefundState,
  SwapIntent,
  SwapRecord,
  SwapSettlementListener,
  SwapStatistics,
  SwapStatus,
  systemClock,
  UserPreferences,
} from '../types';
import { describeError, GasOptimizerError } from '../utils/errors';
import { KeyedMutex } from '../utils/keyedMutex';
import { logError, logger, logSwap, logTransition } from '../utils/logger';
import { AccessControl, Capability } from './accessControl';
import { ChainRegistry } from './chainRegistry';
import { CostModel } from './costModel';

export interface OrchestratorSettings {
  /** Address holding funds between bridge legs; depositor of return and refund transfers */
  escrowAddress: string;
  /** How long a user must wait before recovering their own swap (default 3600s) */
  recoveryTimeoutSeconds: number;
  thresholds: OptimizationThresholds;
}

export interface SwapOrchestratorDeps {
  registry: ChainRegistry;
  costModel: CostModel;
  bridge: BridgeClient;
  access: AccessControl;
  settings: OrchestratorSettings;
  clock?: Clock;
  listeners?: SwapSettlementListener[];
}

export const TERMINAL_STATUSES: ReadonlySet<SwapStatus> = new Set<SwapStatus>(['Completed', 'Failed', 'Recovered']);

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

const SWAP_ID_NAMESPACE = '6f1c2a52-8d4e-4b7a-9a51-3c2e7d9b0f14';

interface StatsAccumulator {
  totalSwaps: number;
  successfulSwaps: number;
  failedSwaps: number;
  recoveredSwaps: number;
  totalExecutionTimeSeconds: number;
  totalSavingsUSD: bigint;
  totalVolumeUSD: bigint;
}

function emptyStats(): StatsAccumulator {
  return {
    totalSwaps: 0,
    successfulSwaps: 0,
    failedSwaps: 0,
    recoveredSwaps: 0,
    totalExecutionTimeSeconds: 0,
    totalSavingsUSD: 0n,
    totalVolumeUSD: 0n,
  };
}

function toStatistics(stats: StatsAccumulator): SwapStatistics {
  return {
    totalSwaps: stats.totalSwaps,
    successfulSwaps: stats.successfulSwaps,
    failedSwaps: stats.failedSwaps,
    recoveredSwaps: stats.recoveredSwaps,
    averageExecutionTimeSeconds: stats.successfulSwaps === 0 ? 0 : stats.totalExecutionTimeSeconds / stats.successfulSwaps,
    totalSavingsUSD: stats.totalSavingsUSD,
    totalVolumeUSD: stats.totalVolumeUSD,
  };
}

function validateThresholds(thresholds: Partial<OptimizationThresholds>): void {
  const { minSavingsBps, minAbsoluteSavingsUSD, maxBridgeTimeSeconds } = thresholds;
  if (minSavingsBps !== undefined && (!Number.isInteger(minSavingsBps) || minSavingsBps < 0 || minSavingsBps > 10_000)) {
    throw new GasOptimizerError('InvalidConfiguration', `minSavingsBps must be within 0-10000, got ${minSavingsBps}`);
  }
  if (minAbsoluteSavingsUSD !== undefined && minAbsoluteSavingsUSD < 0n) {
    throw new GasOptimizerError('InvalidConfiguration', 'minAbsoluteSavingsUSD must not be negative');
  }
  if (maxBridgeTimeSeconds !== undefined && maxBridgeTimeSeconds < 0) {
    throw new GasOptimizerError('InvalidConfiguration', 'maxBridgeTimeSeconds must not be negative');
  }
}

/**
 * Drives cross-chain swaps through
 * `Bridging -> Swapping -> BridgingBack -> Completed`, with `Failed` and
 * `Recovered` reachable from every non-terminal state.
 *
 * Every transition runs under a per-swap lock. Bridge I/O never happens while
 * the lock is held: a transition commits, releases, calls the bridge, then
 * re-acquires the lock to commit the outcome.
 */
export class SwapOrchestrator {
  private readonly registry: ChainRegistry;
  private readonly costModel: CostModel;
  private readonly bridge: BridgeClient;
  private readonly access: AccessControl;
  private readonly settings: OrchestratorSettings;
  private readonly clock: Clock;
  private readonly listeners: SwapSettlementListener[];

  private readonly swaps = new Map<string, SwapRecord>();
  private readonly swapsByUser = new Map<string, string[]>();
  private readonly activeByUser = new Map<string, Set<string>>();
  private readonly preferences = new Map<string, UserPreferences>();
  private readonly chainStats = new Map<ChainId, StatsAccumulator>();
  private readonly globalStats = emptyStats();
  private readonly userSavings = new Map<string, bigint>();
  private readonly locks = new KeyedMutex();

  private thresholds: OptimizationThresholds;
  private paused = false;
  private nonce = 0;

  constructor(deps: SwapOrchestratorDeps) {
    this.registry = deps.registry;
    this.costModel = deps.costModel;
    this.bridge = deps.bridge;
    this.access = deps.access;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
    this.listeners = deps.listeners ?? [];

    validateThresholds(deps.settings.thresholds);
    this.thresholds = { ...deps.settings.thresholds };
  }

  get localChainId(): ChainId {
    return this.costModel.localChainId;
  }

  /**
   * Side-effect free. Stale price data and user opt-outs produce
   * `shouldOptimize: false` rather than an error.
   */
  async quote(intent: SwapIntent): Promise<OptimizationQuote> {
    const localChain = this.localChainId;
    const stayLocal = (reason: string): OptimizationQuote => ({
      originalChain: localChain,
      optimizedChain: localChain,
      savingsUSD: 0n,
      savingsBps: 0,
      estimatedBridgeTime: 0,
      shouldOptimize: false,
      reason,
    });

    const preferences = this.preferences.get(intent.user);
    if (preferences?.optimizationEnabled === false) {
      return stayLocal('optimization disabled by user');
    }
    if (preferences?.crossChainEnabled === false) {
      return stayLocal('cross-chain swaps disabled by user');
    }
    const thresholds = this.effectiveThresholds(preferences);

    try {
      const result = await this.costModel.findOptimalChain({
        tokenIn: intent.tokenIn,
        tokenOut: intent.tokenOut,
        amountIn: intent.amountIn,
        excludeChains: intent.excludeChains,
        gasUsageUnits: intent.gasUsageUnits,
        ...thresholds,
      });

      if (result.chainId === localChain || !result.best) {
        return stayLocal('no chain clears the savings thresholds');
      }

      return {
        originalChain: localChain,
        optimizedChain: result.chainId,
        savingsUSD: result.expectedSavingsUSD,
        savingsBps: result.savingsBps,
        estimatedBridgeTime: result.best.estimatedExecutionTimeSeconds,
        shouldOptimize: true,
      };
    } catch (error) {
      if (error instanceof GasOptimizerError && error.category === 'staleness') {
        logger.warn(`Quote falls back to local execution: ${error.message}`, { code: error.code });
        return stayLocal(error.code);
      }
      throw error;
    }
  }

  async initiate(params: InitiateSwapParams): Promise<InitiateSwapResult> {
    this.validateInitiation(params);

    let destination = params.destinationChain;
    let quote: OptimizationQuote | undefined;
    let expectedSavingsUSD = 0n;

    if (destination === undefined) {
      quote = await this.quote(params);
      if (!quote.shouldOptimize) {
        logSwap('Swap stays on the local chain', { user: params.user, reason: quote.reason });
        return { kind: 'local', quote };
      }
      destination = quote.optimizedChain;
      expectedSavingsUSD = quote.savingsUSD;
      // pause or deadline may have changed while the quote was pending
      this.validateInitiation(params);
    } else if (this.preferences.get(params.user)?.crossChainEnabled === false) {
      throw new GasOptimizerError('InvalidDestinationChain', `Cross-chain swaps are disabled for ${params.user}`, {
        user: params.user,
        destinationChain: destination,
      });
    }

    this.requireDestination(destination);
    const record = this.createRecord(params, destination, expectedSavingsUSD);

    await this.requestTransfer(record.swapId, 'outbound', {
      depositor: record.user,
      recipient: this.settings.escrowAddress,
      token: record.tokenIn,
      amount: record.amountIn,
      originChain: record.sourceChain,
      destinationChain: record.destinationChain,
      message: `swap:${record.swapId}`,
    });

    return { kind: 'crossChain', quote, record: this.getSwap(record.swapId) };
  }

  async handleDestinationSwap(swapId: string, result: DestinationSwapResult): Promise<SwapRecord> {
    const outcome = await this.locks.runExclusive(swapId, () => {
      const record = this.requireRecord(swapId);
      this.assertStatus(record, 'Bridging', 'handleDestinationSwap');

      if (!result.success) {
        this.markFailed(record, result.reason ?? 'destination swap failed');
        return { record: this.copy(record), returnLeg: undefined };
      }
      if (result.amountOut <= 0n || result.amountOut < record.minAmountOut) {
        this.markFailed(record, `destination output ${result.amountOut} below minimum ${record.minAmountOut}`);
        return { record: this.copy(record), returnLeg: undefined };
      }

      record.amountOut = result.amountOut;
      this.transition(record, 'Swapping');

      const returnLeg: BridgeTransferRequest = {
        depositor: this.settings.escrowAddress,
        recipient: record.recipient,
        token: record.tokenOut,
        amount: record.amountOut,
        originChain: record.destinationChain,
        destinationChain: record.sourceChain,
        message: `return:${record.swapId}`,
      };
      return { record: this.copy(record), returnLeg };
    });

    if (!outcome.returnLeg) {
      await this.settle(outcome.record);
      return outcome.record;
    }

    await this.requestTransfer(swapId, 'return', outcome.returnLeg);
    return this.getSwap(swapId);
  }

  async complete(swapId: string): Promise<SwapRecord> {
    const settled = await this.locks.runExclusive(swapId, () => {
      const record = this.requireRecord(swapId);
      this.assertStatus(record, 'BridgingBack', 'complete');

      record.completedAt = this.terminalTimestamp(record);
      this.transition(record, 'Completed');

      const executionTime = record.completedAt - record.initiatedAt;
      for (const stats of this.statsFor(record.destinationChain)) {
        stats.successfulSwaps += 1;
        stats.totalExecutionTimeSeconds += executionTime;
        stats.totalSavingsUSD += record.expectedSavingsUSD;
        stats.totalVolumeUSD += record.amountIn;
      }
      this.userSavings.set(record.user, (this.userSavings.get(record.user) ?? 0n) + record.expectedSavingsUSD);

      return this.copy(record);
    });

    logSwap('Swap completed', {
      swapId,
      amountIn: settled.amountIn,
      amountOut: settled.amountOut,
      executionTimeSeconds: settled.completedAt - settled.initiatedAt,
    });
    await this.settle(settled);
    return settled;
  }

  /** Moves a non-terminal swap to `Failed`, e.g. when the bridge reports a failed fill. */
  async fail(swapId: string, reason: string): Promise<SwapRecord> {
    const settled = await this.locks.runExclusive(swapId, () => {
      const record = this.requireRecord(swapId);
      if (TERMINAL_STATUSES.has(record.status)) {
        throw new GasOptimizerError('SwapNotActive', `Swap ${swapId} is already ${record.status}`, { swapId, status: record.status });
      }
      this.markFailed(record, reason);
      return this.copy(record);
    });

    await this.settle(settled);
    return settled;
  }

  /**
   * Unwinds a stuck swap. The swap's own user may recover once the recovery
   * timeout has passed since initiation; an admin may recover at any time.
   */
  async emergencyRecovery(swapId: string, caller: string | Capability): Promise<SwapRecord> {
    const plan = await this.locks.runExclusive(swapId, () => {
      const record = this.requireRecord(swapId);
      if (TERMINAL_STATUSES.has(record.status)) {
        throw new GasOptimizerError('SwapNotActive', `Swap ${swapId} is already ${record.status}`, { swapId, status: record.status });
      }
      this.authorizeRecovery(record, caller);

      const leg = this.planRefund(record);
      const returnReference = record.status === 'BridgingBack' ? record.returnBridgeReferenceId : '';
      record.completedAt = this.terminalTimestamp(record);
      record.refund = { status: this.initialRefundStatus(record, leg), requestedAt: record.completedAt };
      this.transition(record, 'Recovered');
      for (const stats of this.statsFor(record.destinationChain)) {
        stats.recoveredSwaps += 1;
      }
      return { leg, returnReference };
    });

    const refundLeg = plan.returnReference ? await this.resolveReturnLeg(swapId, plan.returnReference) : plan.leg;
    if (refundLeg) {
      await this.requestRefund(swapId, refundLeg);
    }

    const settled = this.getSwap(swapId);
    await this.settle(settled);
    return settled;
  }

  /**
   * Re-requests the refund of a `Failed` or `Recovered` swap whose funds are
   * still held. A swap with a return transfer is refunded only if the bridge
   * does not report that transfer as filled.
   */
  async retryRefund(admin: Capability, swapId: string): Promise<SwapRecord> {
    this.access.requireRole(admin, 'admin');

    const plan = await this.locks.runExclusive(swapId, () => {
      const record = this.requireRecord(swapId);
      if (record.status !== 'Failed' && record.status !== 'Recovered') {
        throw new GasOptimizerError('InvalidStateTransition', `Cannot refund swap ${swapId} in state ${record.status}`, {
          swapId,
          status: record.status,
        });
      }
      if (record.refund?.status === 'requested' || record.refund?.status === 'pending') {
        throw new GasOptimizerError('InvalidStateTransition', `Refund for swap ${swapId} is already ${record.refund.status}`, {
          swapId,
          referenceId: record.refund.referenceId,
        });
      }
      if (!this.planRefund(record, true)) {
        throw new GasOptimizerError('InvalidStateTransition', `Swap ${swapId} holds no funds to refund`, { swapId });
      }
      record.refund = { status: 'requested', requestedAt: this.clock() };
      const returnReference = record.returnBridgeReferenceId;
      return { leg: returnReference ? undefined : this.planRefund(record), returnReference };
    });

    logger.info('Refund retry requested', { by: admin.holder, swapId });
    const refundLeg = plan.returnReference ? await this.resolveReturnLeg(swapId, plan.returnReference) : plan.leg;
    if (refundLeg) {
      await this.requestRefund(swapId, refundLeg);
    }
    return this.getSwap(swapId);
  }

  setPaused(admin: Capability, paused: boolean): void {
    this.access.requireRole(admin, 'admin');
    this.paused = paused;
    logger.warn(`Swap initiation ${paused ? 'paused' : 'resumed'}`, { by: admin.holder });
  }

  isPaused(): boolean {
    return this.paused;
  }

  setThresholds(admin: Capability, thresholds: Partial<OptimizationThresholds>): OptimizationThresholds {
    this.access.requireRole(admin, 'admin');
    validateThresholds(thresholds);
    this.thresholds = { ...this.thresholds, ...thresholds };
    logger.info('Optimization thresholds updated', { by: admin.holder, ...this.thresholds });
    return { ...this.thresholds };
  }

  getThresholds(): OptimizationThresholds {
    return { ...this.thresholds };
  }

  setPreferences(caller: string, user: string, preferences: UserPreferences): UserPreferences {
    if (!user || caller !== user) {
      throw new GasOptimizerError('Unauthorized', 'Preferences can only be changed by their owner', { caller, user });
    }
    validateThresholds(preferences);
    const stored = { ...preferences };
    this.preferences.set(user, stored);
    logger.info('User preferences updated', { user, ...stored });
    return { ...stored };
  }

  getPreferences(user: string): UserPreferences | undefined {
    const preferences = this.preferences.get(user);
    return preferences ? { ...preferences } : undefined;
  }

  getSwap(swapId: string): SwapRecord {
    return this.copy(this.requireRecord(swapId));
  }

  getActiveSwaps(user: string): string[] {
    return [...(this.activeByUser.get(user) ?? [])];
  }

  getUserSwaps(user: string): SwapRecord[] {
    return (this.swapsByUser.get(user) ?? []).map((swapId) => this.getSwap(swapId));
  }

  listActiveSwaps(): SwapRecord[] {
    const active: SwapRecord[] = [];
    for (const record of this.swaps.values()) {
      if (!TERMINAL_STATUSES.has(record.status)) {
        active.push(this.copy(record));
      }
    }
    return active;
  }

  getChainStatistics(chainId: ChainId): SwapStatistics {
    return toStatistics(this.chainStats.get(chainId) ?? emptyStats());
  }

  getGlobalStatistics(): SwapStatistics {
    return toStatistics(this.globalStats);
  }

  getUserSavings(user: string): bigint {
    return this.userSavings.get(user) ?? 0n;
  }

  private validateInitiation(params: InitiateSwapParams): void {
    if (this.paused) {
      throw new GasOptimizerError('OperationsPaused', 'New swaps are paused');
    }
    if (!params.user || params.user.trim() === '' || params.user.toLowerCase() === ZERO_ADDRESS) {
      throw new GasOptimizerError('InvalidUser', 'Swap user must be a non-zero address');
    }
    if (params.amountIn <= 0n) {
      throw new GasOptimizerError('InvalidAmount', 'amountIn must be positive', { amountIn: params.amountIn });
    }
    if (params.minAmountOut !== undefined && params.minAmountOut < 0n) {
      throw new GasOptimizerError('InvalidAmount', 'minAmountOut must not be negative', { minAmountOut: params.minAmountOut });
    }
    const now = this.clock();
    if (params.deadline <= now) {
      throw new GasOptimizerError('DeadlineExpired', `Deadline ${params.deadline} is not after ${now}`, { deadline: params.deadline });
    }
  }

  private requireDestination(chainId: ChainId): void {
    if (chainId === this.localChainId || !this.registry.isEnabled(chainId)) {
      throw new GasOptimizerError('InvalidDestinationChain', `Chain ${chainId} is not an available destination`, { chainId });
    }
  }

  private createRecord(params: InitiateSwapParams, destinationChain: ChainId, expectedSavingsUSD: bigint): SwapRecord {
    const initiatedAt = this.clock();
    let swapId: string;
    do {
      this.nonce += 1;
      swapId = uuidv5(
        [params.user, params.tokenIn, params.tokenOut, params.amountIn, destinationChain, initiatedAt, this.nonce].join('|'),
        SWAP_ID_NAMESPACE
      );
    } while (this.swaps.has(swapId));

    const record: SwapRecord = {
      swapId,
      user: params.user,
      recipient: params.recipient ?? params.user,
      tokenIn: params.tokenIn,
      tokenOut: params.tokenOut,
      amountIn: params.amountIn,
      minAmountOut: params.minAmountOut ?? 0n,
      amountOut: 0n,
      sourceChain: this.localChainId,
      destinationChain,
      initiatedAt,
      deadline: params.deadline,
      completedAt: 0,
      // bridging starts as soon as the record exists
      status: 'Bridging',
      bridgeReferenceId: '',
      returnBridgeReferenceId: '',
      expectedSavingsUSD,
    };

    this.swaps.set(swapId, record);
    this.swapsByUser.set(record.user, [...(this.swapsByUser.get(record.user) ?? []), swapId]);
    const active = this.activeByUser.get(record.user) ?? new Set<string>();
    active.add(swapId);
    this.activeByUser.set(record.user, active);
    for (const stats of this.statsFor(destinationChain)) {
      stats.totalSwaps += 1;
    }

    logTransition(record, 'Initiated');
    return record;
  }

  private async requestTransfer(swapId: string, leg: 'outbound' | 'return', request: BridgeTransferRequest): Promise<void> {
    let referenceId: string;
    try {
      referenceId = await this.bridge.transfer(request);
    } catch (error) {
      logError(`Bridge ${leg} transfer failed for swap ${swapId}`, error);
      const outcome = await this.locks.runExclusive(swapId, () => {
        const record = this.requireRecord(swapId);
        if (TERMINAL_STATUSES.has(record.status)) {
          logger.warn(`Swap ${swapId} settled as ${record.status} before its ${leg} transfer failed`);
          // a failed return transfer leaves the output in escrow
          return { settled: undefined, refundLeg: this.resolvePendingRefund(record, leg === 'return') };
        }
        this.markFailed(record, `${leg} bridge transfer failed: ${describeError(error)}`);
        return { settled: this.copy(record), refundLeg: undefined };
      });
      if (outcome.settled) {
        await this.settle(outcome.settled);
      }
      if (outcome.refundLeg) {
        await this.requestRefund(swapId, outcome.refundLeg);
      }
      return;
    }

    const refundLeg = await this.locks.runExclusive(swapId, () => {
      const record = this.requireRecord(swapId);
      if (leg === 'outbound') {
        record.bridgeReferenceId = referenceId;
      } else {
        record.returnBridgeReferenceId = referenceId;
        if (record.status === 'Swapping') {
          this.transition(record, 'BridgingBack');
        }
      }
      if (!TERMINAL_STATUSES.has(record.status)) {
        return undefined;
      }
      logger.warn(`Swap ${swapId} settled as ${record.status} while its ${leg} transfer was pending`, { referenceId });
      // a landed outbound deposit leaves the input in escrow
      return this.resolvePendingRefund(record, leg === 'outbound');
    });

    if (refundLeg) {
      await this.requestRefund(swapId, refundLeg);
    }
  }

  private async requestRefund(swapId: string, request: BridgeTransferRequest): Promise<void> {
    try {
      const referenceId = await this.bridge.transfer(request);
      await this.locks.runExclusive(swapId, () => {
        const record = this.requireRecord(swapId);
        record.refund = { status: 'requested', referenceId, requestedAt: record.refund?.requestedAt ?? this.clock() };
      });
      logSwap('Refund submitted', { swapId, referenceId, amount: request.amount, token: request.token });
    } catch (error) {
      logError(`Refund transfer failed for swap ${swapId}`, error);
      await this.locks.runExclusive(swapId, () => {
        const record = this.requireRecord(swapId);
        record.refund = {
          status: 'failed',
          error: describeError(error),
          requestedAt: record.refund?.requestedAt ?? this.clock(),
        };
      });
    }
  }

  /**
   * Where the user's funds sit and how to send them back. Nothing is refunded
   * before the outbound deposit exists, or once a return leg carries the funds.
   */
  private planRefund(record: SwapRecord, returnLegUndelivered = false): BridgeTransferRequest | undefined {
    if (!record.bridgeReferenceId || record.status === 'Swapping') {
      return undefined;
    }
    if (record.returnBridgeReferenceId && !returnLegUndelivered) {
      return undefined;
    }
    const holdsOutput = record.amountOut > 0n;
    return {
      depositor: this.settings.escrowAddress,
      recipient: record.user,
      token: holdsOutput ? record.tokenOut : record.tokenIn,
      amount: holdsOutput ? record.amountOut : record.amountIn,
      originChain: record.destinationChain,
      destinationChain: record.sourceChain,
      message: `refund:${record.swapId}`,
    };
  }

  /** Refund state stamped when a swap is recovered, before any transfer outcome is known. */
  private initialRefundStatus(record: SwapRecord, leg: BridgeTransferRequest | undefined): RefundState['status'] {
    if (leg) {
      return 'requested';
    }
    const transferInFlight = (record.status === 'Bridging' && !record.bridgeReferenceId) || record.status === 'Swapping';
    return transferInFlight || record.status === 'BridgingBack' ? 'pending' : 'notRequired';
  }

  /** Decides a `pending` refund once the transfer it waited on has an outcome. */
  private resolvePendingRefund(record: SwapRecord, fundsInEscrow: boolean): BridgeTransferRequest | undefined {
    if (record.refund?.status !== 'pending') {
      return undefined;
    }
    const leg = fundsInEscrow ? this.planRefund(record) : undefined;
    record.refund = { status: leg ? 'requested' : 'notRequired', requestedAt: record.refund.requestedAt };
    return leg;
  }

  /**
   * Refund for a recovered or failed swap whose return transfer was submitted.
   * The output is refunded from escrow unless the bridge reports the transfer filled.
   */
  private async resolveReturnLeg(swapId: string, referenceId: string): Promise<BridgeTransferRequest | undefined> {
    let delivered: boolean;
    try {
      delivered = (await this.bridge.status(referenceId)).completed;
    } catch (error) {
      logError(`Could not read return transfer ${referenceId} of swap ${swapId}`, error);
      await this.locks.runExclusive(swapId, () => {
        const record = this.requireRecord(swapId);
        record.refund = {
          status: 'failed',
          error: `return transfer status unavailable: ${describeError(error)}`,
          requestedAt: record.refund?.requestedAt ?? this.clock(),
        };
      });
      return undefined;
    }

    return this.locks.runExclusive(swapId, () => {
      const record = this.requireRecord(swapId);
      const leg = delivered ? undefined : this.planRefund(record, true);
      record.refund = { status: leg ? 'requested' : 'notRequired', requestedAt: record.refund?.requestedAt ?? this.clock() };
      return leg;
    });
  }

  private authorizeRecovery(record: SwapRecord, caller: string | Capability): void {
    if (typeof caller !== 'string') {
      this.access.requireRole(caller, 'admin');
      return;
    }
    if (caller !== record.user) {
      throw new GasOptimizerError('Unauthorized', `Only the swap's user or an admin can recover swap ${record.swapId}`, {
        swapId: record.swapId,
        caller,
      });
    }
    const elapsed = this.clock() - record.initiatedAt;
    if (elapsed <= this.settings.recoveryTimeoutSeconds) {
      throw new GasOptimizerError(
        'RecoveryNotAllowed',
        `Swap ${record.swapId} can be recovered by its user after ${this.settings.recoveryTimeoutSeconds}s (elapsed ${elapsed}s)`,
        { swapId: record.swapId, elapsed }
      );
    }
  }

  private assertStatus(record: SwapRecord, expected: SwapStatus, operation: string): void {
    if (record.status !== expected) {
      throw new GasOptimizerError(
        'InvalidStateTransition',
        `${operation} requires swap ${record.swapId} to be ${expected}, but it is ${record.status}`,
        { swapId: record.swapId, status: record.status, expected }
      );
    }
  }

  private markFailed(record: SwapRecord, reason: string): void {
    record.failureReason = reason;
    record.completedAt = this.terminalTimestamp(record);
    this.transition(record, 'Failed');
    for (const stats of this.statsFor(record.destinationChain)) {
      stats.failedSwaps += 1;
    }
  }

  private transition(record: SwapRecord, to: SwapStatus): void {
    const from = record.status;
    record.status = to;
    if (TERMINAL_STATUSES.has(to)) {
      this.activeByUser.get(record.user)?.delete(record.swapId);
    }
    logTransition(record, from);
  }

  private terminalTimestamp(record: SwapRecord): number {
    return Math.max(this.clock(), record.initiatedAt);
  }

  private statsFor(chainId: ChainId): StatsAccumulator[] {
    let chain = this.chainStats.get(chainId);
    if (!chain) {
      chain = emptyStats();
      this.chainStats.set(chainId, chain);
    }
    return [chain, this.globalStats];
  }

  private effectiveThresholds(preferences?: UserPreferences): OptimizationThresholds {
    return {
      minSavingsBps: preferences?.minSavingsBps ?? this.thresholds.minSavingsBps,
      minAbsoluteSavingsUSD: preferences?.minAbsoluteSavingsUSD ?? this.thresholds.minAbsoluteSavingsUSD,
      maxBridgeTimeSeconds: preferences?.maxBridgeTimeSeconds ?? this.thresholds.maxBridgeTimeSeconds,
    };
  }

  private requireRecord(swapId: string): SwapRecord {
    const record = this.swaps.get(swapId);
    if (!record) {
      throw new GasOptimizerError('SwapNotFound', `Unknown swap ${swapId}`, { swapId });
    }
    return record;
  }

  private copy(record: SwapRecord): SwapRecord {
    return { ...record, refund: record.refund ? { ...record.refund } : undefined };
  }

  private async settle(record: SwapRecord): Promise<void> {
    const results = await Promise.allSettled(this.listeners.map((listener) => listener.onSwapSettled(record)));
    for (const result of results) {
      if (result.status === 'rejected') {
        logError(`Settlement listener failed for swap ${record.swapId}`, result.reason);
      }
    }
  }
}
