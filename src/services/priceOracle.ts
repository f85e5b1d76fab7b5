import {
  AssetPrice,
  ChainId,
  Clock,
  CongestionLevel,
  GasPriceSample,
  GasPriceTrend,
  PriceFeedClient,
  systemClock,
} from '../types';
import { describeError, GasOptimizerError } from '../utils/errors';
import { logger } from '../utils/logger';
import { RingBuffer } from '../utils/ringBuffer';
import { USD_SCALE } from '../utils/usd';
import { AccessControl, Capability } from './accessControl';
import { ChainRegistry } from './chainRegistry';

export interface PriceOracleSettings {
  /** Inclusive lower bound for keeper updates, in wei */
  minGasPrice: bigint;
  /** Inclusive upper bound for keeper updates, in wei */
  maxGasPrice: bigint;
  /** Gas samples older than this are not used for decisions (default 600s) */
  stalenessThresholdSeconds: number;
  /** Native asset USD prices older than this are rejected (default 3600s) */
  feedMaxAgeSeconds: number;
  /** Ring buffer capacity per chain (default 24) */
  historySize: number;
}

export const DEFAULT_ORACLE_SETTINGS: PriceOracleSettings = {
  minGasPrice: 1n,
  maxGasPrice: 10_000_000_000_000n,
  stalenessThresholdSeconds: 600,
  feedMaxAgeSeconds: 3600,
  historySize: 24,
};

export interface UsdGasPrice {
  sample: GasPriceSample;
  nativePrice: AssetPrice;
  /** USD cost of one gas unit, 18 decimals */
  gasPriceUSD: bigint;
}

export type UsdGasPriceResult =
  | { ok: true; value: UsdGasPrice }
  | { ok: false; error: GasOptimizerError };

interface ChainPriceState {
  latest: GasPriceSample;
  history: RingBuffer<GasPriceSample>;
}

/**
 * Latest gas price per chain plus a bounded history for trend analysis.
 *
 * Writes come only from the keeper capability. Each update replaces the
 * chain's latest sample with a new frozen object, so a reader sees either
 * the previous sample or the new one.
 */
export class PriceOracle {
  private readonly states = new Map<ChainId, ChainPriceState>();

  constructor(
    private readonly registry: ChainRegistry,
    private readonly priceFeed: PriceFeedClient,
    private readonly access: AccessControl,
    private readonly settings: PriceOracleSettings = DEFAULT_ORACLE_SETTINGS,
    private readonly clock: Clock = systemClock
  ) {}

  update(keeper: Capability, chainId: ChainId, price: bigint): GasPriceSample {
    this.access.requireRole(keeper, 'keeper');
    this.registry.get(chainId);

    if (price < this.settings.minGasPrice || price > this.settings.maxGasPrice) {
      throw new GasOptimizerError(
        'PriceOutOfBounds',
        `Gas price ${price} for chain ${chainId} is outside [${this.settings.minGasPrice}, ${this.settings.maxGasPrice}]`,
        { chainId, price }
      );
    }

    const state = this.states.get(chainId);
    const now = this.clock();
    // observedAt never moves backwards, even if the clock does
    const observedAt = state ? Math.max(now, state.latest.observedAt) : now;
    const sample: GasPriceSample = Object.freeze({ chainId, price, observedAt });

    if (state) {
      state.history.push(sample);
      state.latest = sample;
    } else {
      const history = new RingBuffer<GasPriceSample>(this.settings.historySize);
      history.push(sample);
      this.states.set(chainId, { latest: sample, history });
    }

    logger.debug('Gas price updated', { chainId, price, observedAt, by: keeper.holder });
    return sample;
  }

  get(chainId: ChainId): GasPriceSample {
    this.registry.get(chainId);
    const state = this.states.get(chainId);
    if (!state) {
      throw new GasOptimizerError('UnknownChain', `No gas price has been reported for chain ${chainId}`, { chainId });
    }
    return state.latest;
  }

  isStale(sample: GasPriceSample): boolean {
    return this.clock() - sample.observedAt > this.settings.stalenessThresholdSeconds;
  }

  async getUSD(chainId: ChainId): Promise<bigint> {
    const sample = this.get(chainId);
    const result = await this.toUsd(sample, new Map());
    if (!result.ok) {
      throw result.error;
    }
    return result.value.gasPriceUSD;
  }

  /** Latest samples of several chains, read together before any await. */
  snapshot(chainIds: ChainId[]): Map<ChainId, GasPriceSample> {
    const samples = new Map<ChainId, GasPriceSample>();
    for (const chainId of chainIds) {
      const state = this.states.get(chainId);
      if (state) {
        samples.set(chainId, state.latest);
      }
    }
    return samples;
  }

  /**
   * Resolves a consistent snapshot of gas prices to USD. Gas samples are all
   * captured first; each native asset is then priced once. Failures are
   * reported per chain instead of failing the whole snapshot.
   */
  async usdSnapshot(chainIds: ChainId[]): Promise<Map<ChainId, UsdGasPriceResult>> {
    const samples = this.snapshot(chainIds);
    const assetPrices = new Map<string, Promise<AssetPrice>>();
    const results = new Map<ChainId, UsdGasPriceResult>();

    await Promise.all(
      chainIds.map(async (chainId) => {
        const sample = samples.get(chainId);
        if (!sample) {
          results.set(chainId, {
            ok: false,
            error: new GasOptimizerError('UnknownChain', `No gas price has been reported for chain ${chainId}`, { chainId }),
          });
          return;
        }
        results.set(chainId, await this.toUsd(sample, assetPrices));
      })
    );

    return results;
  }

  trend(chainId: ChainId, windowSize: number): GasPriceTrend {
    this.get(chainId);
    const history = this.states.get(chainId)?.history;
    const window = history ? history.latest(Math.max(1, Math.floor(windowSize))) : [];
    const prices = window.map((sample) => sample.price);
    const count = prices.length;

    let sum = 0n;
    let min = prices[0];
    let max = prices[0];
    for (const price of prices) {
      sum += price;
      if (price < min) min = price;
      if (price > max) max = price;
    }
    const average = sum / BigInt(count);

    let isIncreasing = false;
    if (count >= 2) {
      const half = Math.floor(count / 2);
      const older = prices.slice(0, half);
      const newer = prices.slice(half);
      const olderSum = older.reduce((acc, price) => acc + price, 0n);
      const newerSum = newer.reduce((acc, price) => acc + price, 0n);
      // compare the two means without dividing
      isIncreasing = newerSum * BigInt(older.length) > olderSum * BigInt(newer.length);
    }

    return {
      average,
      min,
      max,
      volatilityBps: average === 0n ? 0 : Number(((max - min) * 10_000n) / average),
      isIncreasing,
      sampleCount: count,
    };
  }

  congestion(chainId: ChainId): CongestionLevel {
    const { congestion } = this.registry.get(chainId);
    const { price } = this.get(chainId);
    if (price <= congestion.low) return 'low';
    if (price <= congestion.medium) return 'medium';
    if (price <= congestion.high) return 'high';
    return 'extreme';
  }

  history(chainId: ChainId): GasPriceSample[] {
    return this.states.get(chainId)?.history.toArray() ?? [];
  }

  private async toUsd(sample: GasPriceSample, assetPrices: Map<string, Promise<AssetPrice>>): Promise<UsdGasPriceResult> {
    const now = this.clock();
    const age = now - sample.observedAt;
    if (age > this.settings.stalenessThresholdSeconds) {
      return {
        ok: false,
        error: new GasOptimizerError('StalePrice', `Gas price for chain ${sample.chainId} is ${age}s old`, {
          chainId: sample.chainId,
          observedAt: sample.observedAt,
          thresholdSeconds: this.settings.stalenessThresholdSeconds,
        }),
      };
    }

    let chainAsset: string;
    try {
      chainAsset = this.registry.get(sample.chainId).nativeAsset;
    } catch (error) {
      if (error instanceof GasOptimizerError) {
        return { ok: false, error };
      }
      throw error;
    }

    let pending = assetPrices.get(chainAsset);
    if (!pending) {
      pending = this.priceFeed.getUSDPrice(chainAsset);
      assetPrices.set(chainAsset, pending);
    }

    let nativePrice: AssetPrice;
    try {
      nativePrice = await pending;
    } catch (error) {
      return {
        ok: false,
        error: new GasOptimizerError('PriceFeedUnavailable', `USD price for ${chainAsset} unavailable: ${describeError(error)}`, {
          chainId: sample.chainId,
          assetId: chainAsset,
        }),
      };
    }

    if (nativePrice.price <= 0n) {
      return {
        ok: false,
        error: new GasOptimizerError('PriceFeedUnavailable', `Price feed returned a non-positive price for ${chainAsset}`, {
          chainId: sample.chainId,
          assetId: chainAsset,
        }),
      };
    }

    const feedAge = now - nativePrice.updatedAt;
    if (feedAge > this.settings.feedMaxAgeSeconds) {
      return {
        ok: false,
        error: new GasOptimizerError('PriceFeedUnavailable', `USD price for ${chainAsset} is ${feedAge}s old`, {
          chainId: sample.chainId,
          assetId: chainAsset,
          updatedAt: nativePrice.updatedAt,
        }),
      };
    }

    return {
      ok: true,
      value: {
        sample,
        nativePrice,
        gasPriceUSD: (sample.price * nativePrice.price) / USD_SCALE,
      },
    };
  }
}
