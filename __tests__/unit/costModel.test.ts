import { describe, it, expect } from '@jest/globals';
import { ChainConfig } from '../../src/types';
import { compareBreakdowns, LiquidityDepthSlippageEstimator } from '../../src/services/costModel';
import {
  ARBITRUM,
  createTestEnvironment,
  DEFAULT_THRESHOLDS,
  LOCAL_CHAIN,
  makeChain,
  rejectedCode,
  seedCheapCandidate,
  thrownCode,
  usd,
} from '../helpers/fixtures';

const query = {
  tokenIn: 'USDC',
  tokenOut: 'WETH',
  amountIn: usd(1000),
  ...DEFAULT_THRESHOLDS,
};

describe('CostModel', () => {
  describe('findOptimalChain', () => {
    it('should move a $50 swap to a chain where it costs $2', async () => {
      const env = createTestEnvironment();
      seedCheapCandidate(env);

      const result = await env.costModel.findOptimalChain(query);

      expect(result.chainId).toBe(ARBITRUM);
      expect(result.expectedSavingsUSD).toBe(usd(48));
      expect(result.savingsBps).toBe(9600);
      expect(result.baseline).toEqual({
        chainId: LOCAL_CHAIN,
        gasCostUSD: usd(50),
        bridgeFeeUSD: 0n,
        slippageCostUSD: 0n,
        totalCostUSD: usd(50),
        estimatedExecutionTimeSeconds: 0,
      });
      expect(result.best).toEqual({
        chainId: ARBITRUM,
        gasCostUSD: usd(1),
        bridgeFeeUSD: usd(1),
        slippageCostUSD: 0n,
        totalCostUSD: usd(2),
        estimatedExecutionTimeSeconds: 180,
      });
    });

    it('should stay local when savings miss the absolute floor', async () => {
      const env = createTestEnvironment();
      // $45 of gas + $1 bridge fee = $46, saving $4 (800 bps)
      seedCheapCandidate(env, 450_000_000_000n);

      const result = await env.costModel.findOptimalChain(query);

      expect(result.chainId).toBe(LOCAL_CHAIN);
      expect(result.expectedSavingsUSD).toBe(0n);
      expect(result.savingsBps).toBe(0);
      expect(result.best?.totalCostUSD).toBe(usd(46));
    });

    it('should stay local when savings miss the relative floor', async () => {
      const env = createTestEnvironment();
      seedCheapCandidate(env);

      const result = await env.costModel.findOptimalChain({ ...query, minSavingsBps: 9700 });

      expect(result.chainId).toBe(LOCAL_CHAIN);
    });

    it('should skip disabled, excluded and slow chains', async () => {
      const env = createTestEnvironment({
        chains: [
          makeChain(LOCAL_CHAIN),
          makeChain(ARBITRUM),
          makeChain(10, { estimatedBridgeTimeSeconds: 3600 }),
          makeChain(8453),
        ],
      });
      seedCheapCandidate(env);
      env.oracle.update(env.keeper, 10, 10_000_000n);
      env.oracle.update(env.keeper, 8453, 10_000_000n);
      env.registry.setEnabled(env.admin, 8453, false);

      const result = await env.costModel.findOptimalChain({ ...query, excludeChains: [ARBITRUM] });

      expect(result.chainId).toBe(LOCAL_CHAIN);
      expect(result.evaluated).toEqual([]);
    });

    it('should skip candidates above their max acceptable gas price', async () => {
      const env = createTestEnvironment({
        chains: [makeChain(LOCAL_CHAIN), makeChain(ARBITRUM, { maxAcceptableGasPrice: 5_000_000_000n })],
      });
      seedCheapCandidate(env);

      const result = await env.costModel.findOptimalChain(query);

      expect(result.chainId).toBe(LOCAL_CHAIN);
      expect(result.evaluated).toHaveLength(0);
    });

    it('should skip candidates with stale prices but fail on a stale baseline', async () => {
      const env = createTestEnvironment({ chains: [makeChain(LOCAL_CHAIN), makeChain(ARBITRUM), makeChain(10)] });
      env.oracle.update(env.keeper, ARBITRUM, 10_000_000_000n);
      env.clock.advance(601);
      env.oracle.update(env.keeper, LOCAL_CHAIN, 500_000_000_000n);
      env.oracle.update(env.keeper, 10, 20_000_000_000n);

      const result = await env.costModel.findOptimalChain(query);
      expect(result.chainId).toBe(10);
      expect(result.evaluated.map((breakdown) => breakdown.chainId)).toEqual([10]);

      env.clock.advance(601);
      await expect(rejectedCode(env.costModel.findOptimalChain(query))).resolves.toBe('StalePrice');
    });

    it('should break cost ties by bridge time, then by chain id', async () => {
      const env = createTestEnvironment({
        chains: [
          makeChain(LOCAL_CHAIN),
          makeChain(10, { estimatedBridgeTimeSeconds: 120 }),
          makeChain(8453, { estimatedBridgeTimeSeconds: 60 }),
          makeChain(ARBITRUM, { estimatedBridgeTimeSeconds: 60 }),
        ],
      });
      env.oracle.update(env.keeper, LOCAL_CHAIN, 500_000_000_000n);
      for (const chainId of [10, 8453, ARBITRUM]) {
        env.oracle.update(env.keeper, chainId, 10_000_000_000n);
      }

      const result = await env.costModel.findOptimalChain(query);

      expect(result.evaluated.map((breakdown) => breakdown.chainId)).toEqual([8453, ARBITRUM, 10]);
      expect(result.chainId).toBe(8453);
    });

    it('should charge the percentage bridge fee on the swap amount', async () => {
      const env = createTestEnvironment();
      seedCheapCandidate(env);
      env.costModel.setBridgeFeeSchedule(env.admin, { baseFeeUSD: usd(1), feeBps: 10 }, ARBITRUM);

      const result = await env.costModel.findOptimalChain(query);

      // $1 base + 0.1% of $1000
      expect(result.best?.bridgeFeeUSD).toBe(usd(2));
      expect(result.expectedSavingsUSD).toBe(usd(47));
    });
  });

  describe('totalCost', () => {
    it('should apply the gas safety margin and cap slippage', async () => {
      const env = createTestEnvironment({
        chains: [makeChain(LOCAL_CHAIN), makeChain(ARBITRUM, { liquidityDepthUSD: usd(10_000) })],
      });
      env.oracle.update(env.keeper, ARBITRUM, 10_000_000_000n);

      // 1000 / 10000 = 10% impact, capped at 3%
      const breakdown = await env.costModel.totalCost(ARBITRUM, 200_000n, 'USDC', 'WETH', usd(1000));

      expect(breakdown.gasCostUSD).toBe(usd(2));
      expect(breakdown.slippageCostUSD).toBe(usd(30));
      expect(breakdown.totalCostUSD).toBe(usd(33));
    });
  });

  describe('bridge fee schedule', () => {
    it('should validate and restrict updates to admins', () => {
      const env = createTestEnvironment();

      expect(thrownCode(() => env.costModel.setBridgeFeeSchedule(env.keeper, { baseFeeUSD: 0n, feeBps: 5 }))).toBe('Unauthorized');
      expect(thrownCode(() => env.costModel.setBridgeFeeSchedule(env.admin, { baseFeeUSD: 0n, feeBps: 10_001 }))).toBe(
        'InvalidConfiguration'
      );
      expect(thrownCode(() => env.costModel.setBridgeFeeSchedule(env.admin, { baseFeeUSD: -1n, feeBps: 5 }))).toBe(
        'InvalidConfiguration'
      );

      env.costModel.setBridgeFeeSchedule(env.admin, { baseFeeUSD: usd(3), feeBps: 5 });
      expect(env.costModel.getBridgeFeeSchedule(ARBITRUM)).toEqual({ baseFeeUSD: usd(3), feeBps: 5 });
    });
  });

  describe('LiquidityDepthSlippageEstimator', () => {
    const estimator = new LiquidityDepthSlippageEstimator();
    const chain: ChainConfig = makeChain(ARBITRUM, { liquidityDepthUSD: usd(1_000_000) });

    it('should scale with trade size against depth', () => {
      expect(estimator.estimateBps(chain, 'USDC', 'WETH', usd(10_000))).toBe(100);
    });

    it('should assume deep liquidity without a configured depth', () => {
      expect(estimator.estimateBps(makeChain(ARBITRUM), 'USDC', 'WETH', usd(10_000))).toBe(0);
    });
  });

  describe('compareBreakdowns', () => {
    it('should order by total cost first', () => {
      const cheap = { chainId: 10, gasCostUSD: 0n, bridgeFeeUSD: 0n, slippageCostUSD: 0n, totalCostUSD: 1n, estimatedExecutionTimeSeconds: 900 };
      const pricey = { ...cheap, chainId: 8, totalCostUSD: 2n, estimatedExecutionTimeSeconds: 1 };

      expect([pricey, cheap].sort(compareBreakdowns).map((breakdown) => breakdown.chainId)).toEqual([10, 8]);
    });
  });
});
