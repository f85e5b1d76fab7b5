import {
  BridgeFeeSchedule,
  ChainConfig,
  ChainId,
  CostBreakdown,
  OptimalChainQuery,
  OptimalChainResult,
} from '../types';
import { GasOptimizerError } from '../utils/errors';
import { logger } from '../utils/logger';
import { applyBps, BPS_DENOMINATOR, toBps } from '../utils/usd';
import { AccessControl, Capability } from './accessControl';
import { ChainRegistry } from './chainRegistry';
import { PriceOracle } from './priceOracle';

export interface SlippageEstimator {
  /** Expected slippage for the trade, in basis points (uncapped) */
  estimateBps(chain: Readonly<ChainConfig>, tokenIn: string, tokenOut: string, amountIn: bigint): number;
}

/**
 * Price impact against a constant liquidity depth: trading 1% of the pool's
 * depth costs 1%. Chains without a configured depth are assumed to be deep.
 */
export class LiquidityDepthSlippageEstimator implements SlippageEstimator {
  estimateBps(chain: Readonly<ChainConfig>, _tokenIn: string, _tokenOut: string, amountIn: bigint): number {
    const depth = chain.liquidityDepthUSD;
    if (depth === undefined || depth <= 0n) {
      return 0;
    }
    return Number((amountIn * BPS_DENOMINATOR) / depth);
  }
}

export interface CostModelSettings {
  /** Chain the caller is on; it pays no bridge fee and no bridge time */
  localChainId: ChainId;
  /** Multiplier applied to gas estimates, in bps (12000 = 1.2x) */
  gasSafetyMarginBps: number;
  defaultGasUsageUnits: bigint;
  bridgeFees: BridgeFeeSchedule;
  /** Upper bound on estimated slippage, in bps */
  maxSlippageBps: number;
}

function validateFeeSchedule(schedule: BridgeFeeSchedule): void {
  if (schedule.baseFeeUSD < 0n || !Number.isInteger(schedule.feeBps) || schedule.feeBps < 0 || schedule.feeBps > 10_000) {
    throw new GasOptimizerError('InvalidConfiguration', 'Bridge fee schedule needs a non-negative base fee and 0-10000 bps', {
      baseFeeUSD: schedule.baseFeeUSD,
      feeBps: schedule.feeBps,
    });
  }
}

/** Cheapest first; ties go to the faster chain, then the lower chain id. */
export function compareBreakdowns(a: CostBreakdown, b: CostBreakdown): number {
  if (a.totalCostUSD !== b.totalCostUSD) {
    return a.totalCostUSD < b.totalCostUSD ? -1 : 1;
  }
  if (a.estimatedExecutionTimeSeconds !== b.estimatedExecutionTimeSeconds) {
    return a.estimatedExecutionTimeSeconds - b.estimatedExecutionTimeSeconds;
  }
  return a.chainId - b.chainId;
}

/**
 * Turns gas, bridge and slippage inputs into comparable USD totals and picks
 * the cheapest chain. Stateless apart from the admin-managed fee schedule;
 * every query captures its inputs up front.
 */
export class CostModel {
  private bridgeFees: BridgeFeeSchedule;
  private readonly chainBridgeFees = new Map<ChainId, BridgeFeeSchedule>();

  constructor(
    private readonly registry: ChainRegistry,
    private readonly oracle: PriceOracle,
    private readonly access: AccessControl,
    private readonly settings: CostModelSettings,
    private readonly slippage: SlippageEstimator = new LiquidityDepthSlippageEstimator()
  ) {
    validateFeeSchedule(settings.bridgeFees);
    this.bridgeFees = { ...settings.bridgeFees };
  }

  get localChainId(): ChainId {
    return this.settings.localChainId;
  }

  async totalCost(
    chainId: ChainId,
    gasUsageUnits: bigint,
    tokenIn: string,
    tokenOut: string,
    amountIn: bigint
  ): Promise<CostBreakdown> {
    const chain = this.registry.get(chainId);
    const schedule = this.getBridgeFeeSchedule(chainId);
    const gasPriceUSD = await this.oracle.getUSD(chainId);
    return this.computeBreakdown(chain, gasPriceUSD, schedule, gasUsageUnits, tokenIn, tokenOut, amountIn);
  }

  async findOptimalChain(query: OptimalChainQuery): Promise<OptimalChainResult> {
    const localChainId = this.settings.localChainId;
    const localChain = this.registry.get(localChainId);
    const excluded = new Set(query.excludeChains ?? []);
    const gasUnits = query.gasUsageUnits ?? this.settings.defaultGasUsageUnits;

    const candidates = this.registry.list().filter((chain) =>
      chain.enabled &&
      chain.chainId !== localChainId &&
      !excluded.has(chain.chainId) &&
      chain.estimatedBridgeTimeSeconds <= query.maxBridgeTimeSeconds
    );
    const schedules = new Map<ChainId, BridgeFeeSchedule>();
    for (const chain of [localChain, ...candidates]) {
      schedules.set(chain.chainId, this.getBridgeFeeSchedule(chain.chainId));
    }

    const prices = await this.oracle.usdSnapshot([localChainId, ...candidates.map((chain) => chain.chainId)]);

    const baselinePrice = prices.get(localChainId);
    if (!baselinePrice) {
      throw new GasOptimizerError('UnknownChain', `No gas price has been reported for chain ${localChainId}`, { chainId: localChainId });
    }
    if (!baselinePrice.ok) {
      throw baselinePrice.error;
    }
    const baseline = this.computeBreakdown(
      localChain,
      baselinePrice.value.gasPriceUSD,
      this.scheduleFrom(schedules, localChainId),
      gasUnits,
      query.tokenIn,
      query.tokenOut,
      query.amountIn
    );

    const evaluated: CostBreakdown[] = [];
    for (const chain of candidates) {
      const price = prices.get(chain.chainId);
      if (!price || !price.ok) {
        logger.debug('Skipping chain without a usable gas price', {
          chainId: chain.chainId,
          reason: price && !price.ok ? price.error.code : 'missing',
        });
        continue;
      }
      if (price.value.sample.price > chain.maxAcceptableGasPrice) {
        logger.debug('Skipping chain above its max acceptable gas price', {
          chainId: chain.chainId,
          price: price.value.sample.price,
        });
        continue;
      }
      evaluated.push(
        this.computeBreakdown(
          chain,
          price.value.gasPriceUSD,
          this.scheduleFrom(schedules, chain.chainId),
          gasUnits,
          query.tokenIn,
          query.tokenOut,
          query.amountIn
        )
      );
    }
    evaluated.sort(compareBreakdowns);

    const best: CostBreakdown | undefined = evaluated[0];
    const stayLocal: OptimalChainResult = {
      chainId: localChainId,
      expectedSavingsUSD: 0n,
      savingsBps: 0,
      baseline,
      best,
      evaluated,
    };

    if (!best || best.totalCostUSD >= baseline.totalCostUSD) {
      return stayLocal;
    }

    const savings = baseline.totalCostUSD - best.totalCostUSD;
    const savingsBps = toBps(savings, baseline.totalCostUSD);
    if (savingsBps < query.minSavingsBps || savings < query.minAbsoluteSavingsUSD) {
      logger.debug('Best chain does not clear the savings thresholds', {
        chainId: best.chainId,
        savings,
        savingsBps,
        minSavingsBps: query.minSavingsBps,
        minAbsoluteSavingsUSD: query.minAbsoluteSavingsUSD,
      });
      return stayLocal;
    }

    return {
      chainId: best.chainId,
      expectedSavingsUSD: savings,
      savingsBps,
      baseline,
      best,
      evaluated,
    };
  }

  getBridgeFeeSchedule(chainId?: ChainId): BridgeFeeSchedule {
    const schedule = chainId === undefined ? undefined : this.chainBridgeFees.get(chainId);
    return { ...(schedule ?? this.bridgeFees) };
  }

  /** Replaces the global schedule, or the override for one chain when `chainId` is given. */
  setBridgeFeeSchedule(admin: Capability, schedule: BridgeFeeSchedule, chainId?: ChainId): void {
    this.access.requireRole(admin, 'admin');
    validateFeeSchedule(schedule);

    if (chainId === undefined) {
      this.bridgeFees = { ...schedule };
    } else {
      this.registry.get(chainId);
      this.chainBridgeFees.set(chainId, { ...schedule });
    }

    logger.info('Bridge fee schedule updated', {
      by: admin.holder,
      chainId: chainId ?? 'global',
      baseFeeUSD: schedule.baseFeeUSD,
      feeBps: schedule.feeBps,
    });
  }

  private scheduleFrom(schedules: Map<ChainId, BridgeFeeSchedule>, chainId: ChainId): BridgeFeeSchedule {
    return schedules.get(chainId) ?? this.bridgeFees;
  }

  private computeBreakdown(
    chain: Readonly<ChainConfig>,
    gasPriceUSD: bigint,
    schedule: BridgeFeeSchedule,
    gasUsageUnits: bigint,
    tokenIn: string,
    tokenOut: string,
    amountIn: bigint
  ): CostBreakdown {
    const isLocal = chain.chainId === this.settings.localChainId;

    const gasCostUSD = applyBps(gasUsageUnits * gasPriceUSD, this.settings.gasSafetyMarginBps);
    const bridgeFeeUSD = isLocal ? 0n : schedule.baseFeeUSD + applyBps(amountIn, schedule.feeBps);
    const slippageBps = Math.min(this.slippage.estimateBps(chain, tokenIn, tokenOut, amountIn), this.settings.maxSlippageBps);
    const slippageCostUSD = applyBps(amountIn, slippageBps);

    return {
      chainId: chain.chainId,
      gasCostUSD,
      bridgeFeeUSD,
      slippageCostUSD,
      totalCostUSD: gasCostUSD + bridgeFeeUSD + slippageCostUSD,
      estimatedExecutionTimeSeconds: isLocal ? 0 : chain.estimatedBridgeTimeSeconds,
    };
  }
}
