import {
  AssetPrice,
  BridgeClient,
  BridgeQuote,
  BridgeTransferRequest,
  BridgeTransferStatus,
  ChainConfig,
  ChainId,
  Clock,
  OptimizationThresholds,
  PriceFeedClient,
  SwapRecord,
  SwapSettlementListener,
} from '../../src/types';
import { AccessControl, Capability } from '../../src/services/accessControl';
import { ChainRegistry } from '../../src/services/chainRegistry';
import { CostModel } from '../../src/services/costModel';
import { DEFAULT_ORACLE_SETTINGS, PriceOracle } from '../../src/services/priceOracle';
import { SwapOrchestrator } from '../../src/services/swapOrchestrator';
import { ErrorCode, GasOptimizerError } from '../../src/utils/errors';
import { USD_SCALE } from '../../src/utils/usd';

export const START_TIME = 1_700_000_000;
export const LOCAL_CHAIN = 1;
export const ARBITRUM = 42161;
export const USER = '0x00000000000000000000000000000000000000aa';
export const ESCROW = '0x00000000000000000000000000000000000000ee';

export function usd(amount: number | bigint): bigint {
  return BigInt(amount) * USD_SCALE;
}

export class ManualClock {
  constructor(public now: number = START_TIME) {}

  readonly clock: Clock = () => this.now;

  advance(seconds: number): void {
    this.now += seconds;
  }
}

export function makeChain(chainId: ChainId, overrides: Partial<ChainConfig> = {}): ChainConfig {
  return {
    chainId,
    name: `Chain ${chainId}`,
    nativeAsset: 'ethereum',
    enabled: true,
    blockTimeSeconds: 2,
    finalityTimeSeconds: 60,
    estimatedBridgeTimeSeconds: chainId === LOCAL_CHAIN ? 0 : 180,
    maxAcceptableGasPrice: 1_000_000_000_000n,
    congestion: { low: 1_000_000_000n, medium: 10_000_000_000n, high: 100_000_000_000n },
    ...overrides,
  };
}

/** In-memory price feed; every asset is quoted at the time of the call unless told otherwise. */
export class StaticPriceFeed implements PriceFeedClient {
  readonly prices = new Map<string, bigint>();
  readonly calls: string[] = [];
  updatedAtOverride?: number;

  constructor(private readonly clock: Clock) {}

  set(assetId: string, price: bigint): void {
    this.prices.set(assetId, price);
  }

  async getUSDPrice(assetId: string): Promise<AssetPrice> {
    this.calls.push(assetId);
    const price = this.prices.get(assetId);
    if (price === undefined) {
      throw new Error(`no test price for ${assetId}`);
    }
    return { assetId, price, updatedAt: this.updatedAtOverride ?? this.clock(), source: 'test' };
  }
}

/** Records every transfer and hands out sequential `origin:n` references. */
export class FakeBridge implements BridgeClient {
  readonly transfers: BridgeTransferRequest[] = [];
  readonly failures: Error[] = [];
  readonly statuses = new Map<string, BridgeTransferStatus>();
  private nextId = 0;
  private gate?: Promise<void>;

  /** Holds every transfer after it is recorded until the returned function is called. */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = undefined;
        resolve();
      };
    });
    return release;
  }

  async waitForTransfers(count: number): Promise<void> {
    while (this.transfers.length < count) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  async quote(_token: string, _amount: bigint, _destinationChain: ChainId): Promise<BridgeQuote> {
    return { feeUSD: usd(1), estimatedTimeSeconds: 180 };
  }

  async transfer(request: BridgeTransferRequest): Promise<string> {
    this.transfers.push(request);
    if (this.gate) {
      await this.gate;
    }
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    this.nextId += 1;
    return `${request.originChain}:${this.nextId}`;
  }

  async status(referenceId: string): Promise<BridgeTransferStatus> {
    return this.statuses.get(referenceId) ?? { completed: false, failed: false, filledAmount: 0n };
  }
}

export class RecordingListener implements SwapSettlementListener {
  readonly settled: string[] = [];

  async onSwapSettled(record: SwapRecord): Promise<void> {
    this.settled.push(`${record.swapId}:${record.status}`);
  }
}

export const DEFAULT_THRESHOLDS: OptimizationThresholds = {
  minSavingsBps: 500,
  minAbsoluteSavingsUSD: usd(10),
  maxBridgeTimeSeconds: 1800,
};

export interface TestEnvironment {
  clock: ManualClock;
  access: AccessControl;
  admin: Capability;
  keeper: Capability;
  registry: ChainRegistry;
  priceFeed: StaticPriceFeed;
  oracle: PriceOracle;
  costModel: CostModel;
  bridge: FakeBridge;
  orchestrator: SwapOrchestrator;
}

export interface TestEnvironmentOptions {
  chains?: ChainConfig[];
  thresholds?: Partial<OptimizationThresholds>;
  listeners?: SwapSettlementListener[];
  recoveryTimeoutSeconds?: number;
}

/**
 * Local chain 1 and one candidate (42161, 180s bridge time), 100k gas units,
 * no safety margin, a flat $1 bridge fee and ETH at $1000.
 */
export function createTestEnvironment(options: TestEnvironmentOptions = {}): TestEnvironment {
  const clock = new ManualClock();
  const access = new AccessControl();
  const admin = access.issueAdmin('test-admin');
  const keeper = access.rotateKeeper(admin, 'test-keeper');
  const registry = new ChainRegistry(access, options.chains ?? [makeChain(LOCAL_CHAIN), makeChain(ARBITRUM)]);
  const priceFeed = new StaticPriceFeed(clock.clock);
  priceFeed.set('ethereum', usd(1000));
  const oracle = new PriceOracle(registry, priceFeed, access, DEFAULT_ORACLE_SETTINGS, clock.clock);
  const costModel = new CostModel(registry, oracle, access, {
    localChainId: LOCAL_CHAIN,
    gasSafetyMarginBps: 10_000,
    defaultGasUsageUnits: 100_000n,
    bridgeFees: { baseFeeUSD: usd(1), feeBps: 0 },
    maxSlippageBps: 300,
  });
  const bridge = new FakeBridge();
  const orchestrator = new SwapOrchestrator({
    registry,
    costModel,
    bridge,
    access,
    settings: {
      escrowAddress: ESCROW,
      recoveryTimeoutSeconds: options.recoveryTimeoutSeconds ?? 3600,
      thresholds: { ...DEFAULT_THRESHOLDS, ...options.thresholds },
    },
    clock: clock.clock,
    listeners: options.listeners,
  });

  return { clock, access, admin, keeper, registry, priceFeed, oracle, costModel, bridge, orchestrator };
}

/** Local gas costs $50 and the candidate $1 + $1 bridge fee. */
export function seedCheapCandidate(env: TestEnvironment, candidatePrice: bigint = 10_000_000_000n): void {
  env.oracle.update(env.keeper, LOCAL_CHAIN, 500_000_000_000n);
  env.oracle.update(env.keeper, ARBITRUM, candidatePrice);
}

export function thrownCode(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof GasOptimizerError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

export async function rejectedCode(promise: Promise<unknown>): Promise<ErrorCode | undefined> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GasOptimizerError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

/** A swap that went out to Arbitrum and came back. */
export function makeRecord(overrides: Partial<SwapRecord> = {}): SwapRecord {
  return {
    swapId: 'swap-1',
    user: USER,
    recipient: USER,
    tokenIn: 'USDC',
    tokenOut: 'WETH',
    amountIn: usd(1000),
    minAmountOut: 0n,
    amountOut: 500n,
    sourceChain: LOCAL_CHAIN,
    destinationChain: ARBITRUM,
    initiatedAt: START_TIME,
    deadline: START_TIME + 600,
    completedAt: START_TIME + 900,
    status: 'Completed',
    bridgeReferenceId: '1:1',
    returnBridgeReferenceId: '42161:2',
    expectedSavingsUSD: usd(48),
    ...overrides,
  };
}
