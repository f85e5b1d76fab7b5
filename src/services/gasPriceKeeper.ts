import axios from 'axios';
import { ChainConfig, ChainId } from '../types';
import { describeError, GasOptimizerError } from '../utils/errors';
import { logger } from '../utils/logger';
import { Capability } from './accessControl';
import { ChainRegistry } from './chainRegistry';
import { PriceOracle } from './priceOracle';

interface JsonRpcResponse {
  result?: string;
  error?: { code?: number; message: string };
}

export interface KeeperRunResult {
  updated: ChainId[];
  failed: { chainId: ChainId; error: string }[];
  /** True when a previous run was still in progress */
  skipped: boolean;
}

/**
 * Polls each enabled chain's RPC endpoint for `eth_gasPrice` and pushes the
 * result into the oracle with the keeper capability.
 */
export class GasPriceKeeper {
  private isRunning = false;

  constructor(
    private readonly registry: ChainRegistry,
    private readonly oracle: PriceOracle,
    private capability: Capability,
    private readonly timeoutMs = 10_000
  ) {}

  /** Swaps in a freshly rotated keeper capability. */
  setCapability(capability: Capability): void {
    this.capability = capability;
  }

  async fetchGasPrice(chain: Readonly<ChainConfig>): Promise<bigint> {
    if (!chain.rpcUrl) {
      throw new GasOptimizerError('InvalidConfiguration', `Chain ${chain.chainId} has no RPC endpoint`, { chainId: chain.chainId });
    }

    const response = await axios.post<JsonRpcResponse>(
      chain.rpcUrl,
      { jsonrpc: '2.0', id: 1, method: 'eth_gasPrice', params: [] },
      { headers: { 'Content-Type': 'application/json' }, timeout: this.timeoutMs }
    );

    const { result, error } = response.data;
    if (error || !result) {
      throw new GasOptimizerError('PriceFeedUnavailable', `eth_gasPrice failed on chain ${chain.chainId}: ${error?.message ?? 'empty result'}`, {
        chainId: chain.chainId,
      });
    }
    return BigInt(result);
  }

  async run(): Promise<KeeperRunResult> {
    if (this.isRunning) {
      logger.warn('Gas price update already in progress, skipping...');
      return { updated: [], failed: [], skipped: true };
    }

    this.isRunning = true;
    try {
      const chains = this.registry.listEnabled().filter((chain) => chain.rpcUrl);
      const prices = await Promise.allSettled(chains.map((chain) => this.fetchGasPrice(chain)));

      const result: KeeperRunResult = { updated: [], failed: [], skipped: false };
      prices.forEach((price, index) => {
        const { chainId } = chains[index];
        const recordFailure = (error: unknown) => {
          logger.warn(`Gas price update failed for chain ${chainId}: ${describeError(error)}`);
          result.failed.push({ chainId, error: describeError(error) });
        };

        if (price.status === 'rejected') {
          recordFailure(price.reason);
          return;
        }
        try {
          this.oracle.update(this.capability, chainId, price.value);
          result.updated.push(chainId);
        } catch (error) {
          recordFailure(error);
        }
      });

      logger.info('Gas prices refreshed', { updated: result.updated, failed: result.failed.length });
      return result;
    } finally {
      this.isRunning = false;
    }
  }
}
