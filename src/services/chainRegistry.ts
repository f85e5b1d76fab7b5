import { ChainConfig, ChainId } from '../types';
import { GasOptimizerError } from '../utils/errors';
import { logger } from '../utils/logger';
import { AccessControl, Capability } from './accessControl';

function freezeConfig(config: ChainConfig): Readonly<ChainConfig> {
  return Object.freeze({ ...config, congestion: Object.freeze({ ...config.congestion }) });
}

export function validateChainConfig(config: ChainConfig): void {
  const problems: string[] = [];

  if (!Number.isInteger(config.chainId) || config.chainId <= 0) {
    problems.push('chainId must be a positive integer');
  }
  if (config.blockTimeSeconds <= 0) {
    problems.push('blockTimeSeconds must be positive');
  }
  if (config.finalityTimeSeconds < config.blockTimeSeconds) {
    problems.push('finalityTimeSeconds must be at least one block');
  }
  if (config.estimatedBridgeTimeSeconds < 0) {
    problems.push('estimatedBridgeTimeSeconds must not be negative');
  }
  if (config.maxAcceptableGasPrice <= 0n) {
    problems.push('maxAcceptableGasPrice must be positive');
  }
  const { low, medium, high } = config.congestion;
  if (!(low <= medium && medium <= high)) {
    problems.push('congestion thresholds must satisfy low <= medium <= high');
  }

  if (problems.length > 0) {
    throw new GasOptimizerError('InvalidConfiguration', `Invalid config for chain ${config.chainId}: ${problems.join('; ')}`, {
      chainId: config.chainId,
    });
  }
}

/**
 * Shared, read-mostly metadata for every supported chain.
 *
 * Entries are never removed, only disabled. Each mutation swaps in a new
 * frozen entry, so a reader holding an older entry keeps a consistent view.
 */
export class ChainRegistry {
  private readonly chains = new Map<ChainId, Readonly<ChainConfig>>();

  constructor(private readonly access: AccessControl, initial: ChainConfig[] = []) {
    for (const chain of initial) {
      validateChainConfig(chain);
      this.chains.set(chain.chainId, freezeConfig(chain));
    }
  }

  has(chainId: ChainId): boolean {
    return this.chains.has(chainId);
  }

  get(chainId: ChainId): Readonly<ChainConfig> {
    const chain = this.chains.get(chainId);
    if (!chain) {
      throw new GasOptimizerError('UnknownChain', `Chain ${chainId} is not configured`, { chainId });
    }
    return chain;
  }

  isEnabled(chainId: ChainId): boolean {
    return this.chains.get(chainId)?.enabled ?? false;
  }

  list(): Readonly<ChainConfig>[] {
    return [...this.chains.values()].sort((a, b) => a.chainId - b.chainId);
  }

  listEnabled(): Readonly<ChainConfig>[] {
    return this.list().filter((chain) => chain.enabled);
  }

  upsert(admin: Capability, config: ChainConfig): Readonly<ChainConfig> {
    this.access.requireRole(admin, 'admin');
    validateChainConfig(config);

    const entry = freezeConfig(config);
    const existed = this.chains.has(config.chainId);
    this.chains.set(config.chainId, entry);

    logger.info(`Chain ${existed ? 'updated' : 'added'}`, {
      by: admin.holder,
      chainId: config.chainId,
      name: config.name,
      enabled: config.enabled,
    });
    return entry;
  }

  setEnabled(admin: Capability, chainId: ChainId, enabled: boolean): Readonly<ChainConfig> {
    this.access.requireRole(admin, 'admin');
    const current = this.get(chainId);
    const entry = freezeConfig({ ...current, enabled });
    this.chains.set(chainId, entry);

    logger.info(`Chain ${enabled ? 'enabled' : 'disabled'}`, { by: admin.holder, chainId, name: current.name });
    return entry;
  }
}
