export type ChainId = number;

/** Seconds since the Unix epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface CongestionThresholds {
  low: bigint;
  medium: bigint;
  high: bigint;
}

export type CongestionLevel = 'low' | 'medium' | 'high' | 'extreme';

export interface ChainConfig {
  chainId: ChainId;
  name: string;
  nativeAsset: string; // price feed asset id of the gas token
  enabled: boolean;
  blockTimeSeconds: number;
  finalityTimeSeconds: number;
  estimatedBridgeTimeSeconds: number;
  maxAcceptableGasPrice: bigint;
  congestion: CongestionThresholds;
  rpcUrl?: string;
  liquidityDepthUSD?: bigint;
}

export interface GasPriceSample {
  chainId: ChainId;
  price: bigint;
  observedAt: number;
}

export interface GasPriceTrend {
  average: bigint;
  min: bigint;
  max: bigint;
  volatilityBps: number;
  isIncreasing: boolean;
  sampleCount: number;
}

export interface AssetPrice {
  assetId: string;
  price: bigint; // USD, 18 decimals
  updatedAt: number;
  source: string;
}

export interface PriceFeedClient {
  getUSDPrice(assetId: string): Promise<AssetPrice>;
}

export interface CostBreakdown {
  chainId: ChainId;
  gasCostUSD: bigint;
  bridgeFeeUSD: bigint;
  slippageCostUSD: bigint;
  totalCostUSD: bigint;
  estimatedExecutionTimeSeconds: number;
}

export interface BridgeFeeSchedule {
  baseFeeUSD: bigint;
  feeBps: number;
}

export interface OptimizationThresholds {
  minSavingsBps: number;
  minAbsoluteSavingsUSD: bigint;
  maxBridgeTimeSeconds: number;
}

export interface OptimalChainQuery extends OptimizationThresholds {
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  excludeChains?: ChainId[];
  gasUsageUnits?: bigint;
}

export interface OptimalChainResult {
  chainId: ChainId;
  expectedSavingsUSD: bigint;
  savingsBps: number;
  baseline: CostBreakdown;
  best?: CostBreakdown;
  evaluated: CostBreakdown[];
}

export interface SwapIntent {
  user: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  excludeChains?: ChainId[];
  gasUsageUnits?: bigint;
}

export interface OptimizationQuote {
  originalChain: ChainId;
  optimizedChain: ChainId;
  savingsUSD: bigint;
  savingsBps: number;
  estimatedBridgeTime: number;
  shouldOptimize: boolean;
  reason?: string;
}

export type SwapStatus =
  | 'Initiated'
  | 'Bridging'
  | 'Swapping'
  | 'BridgingBack'
  | 'Completed'
  | 'Failed'
  | 'Recovered';

/**
 * `pending` means a transfer was still in flight when the swap was recovered;
 * the refund is decided once its outcome is known.
 */
export interface RefundState {
  status: 'pending' | 'requested' | 'failed' | 'notRequired';
  referenceId?: string;
  error?: string;
  requestedAt: number;
}

export interface SwapRecord {
  swapId: string;
  user: string;
  recipient: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  minAmountOut: bigint;
  amountOut: bigint;
  sourceChain: ChainId;
  destinationChain: ChainId;
  initiatedAt: number;
  deadline: number;
  completedAt: number;
  status: SwapStatus;
  bridgeReferenceId: string;
  returnBridgeReferenceId: string;
  expectedSavingsUSD: bigint;
  failureReason?: string;
  refund?: RefundState;
}

export interface InitiateSwapParams extends SwapIntent {
  deadline: number;
  recipient?: string;
  minAmountOut?: bigint;
  destinationChain?: ChainId;
}

export type InitiateSwapResult =
  | { kind: 'local'; quote: OptimizationQuote }
  | { kind: 'crossChain'; quote?: OptimizationQuote; record: SwapRecord };

export interface DestinationSwapResult {
  success: boolean;
  amountOut: bigint;
  reason?: string;
}

export interface UserPreferences {
  minSavingsBps?: number;
  minAbsoluteSavingsUSD?: bigint;
  maxBridgeTimeSeconds?: number;
  optimizationEnabled?: boolean;
  /** When false, swaps always execute on the local chain */
  crossChainEnabled?: boolean;
}

export interface SwapStatistics {
  totalSwaps: number;
  successfulSwaps: number;
  failedSwaps: number;
  recoveredSwaps: number;
  averageExecutionTimeSeconds: number;
  totalSavingsUSD: bigint;
  totalVolumeUSD: bigint;
}

export interface BridgeQuote {
  feeUSD: bigint;
  estimatedTimeSeconds: number;
}

export interface BridgeTransferRequest {
  depositor: string;
  recipient: string;
  token: string;
  amount: bigint;
  originChain: ChainId;
  destinationChain: ChainId;
  message: string;
}

export interface BridgeTransferStatus {
  completed: boolean;
  failed: boolean;
  filledAmount: bigint;
}

export interface BridgeClient {
  quote(token: string, amount: bigint, destinationChain: ChainId): Promise<BridgeQuote>;
  transfer(request: BridgeTransferRequest): Promise<string>;
  status(bridgeReferenceId: string): Promise<BridgeTransferStatus>;
}

/** Receives every swap once it reaches a terminal state. */
export interface SwapSettlementListener {
  onSwapSettled(record: SwapRecord): Promise<void>;
}

export interface NotificationConfig {
  discordWebhook?: string;
  telegramBotToken?: string;
  telegramChatId?: string;
}
