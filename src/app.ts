import { AppConfig, config, loadChainConfigs } from './config';
import { BridgeClient, ChainConfig, Clock, PriceFeedClient, SwapSettlementListener, systemClock } from './types';
import { AccessControl, Capability } from './services/accessControl';
import { AdminService } from './services/adminService';
import { AcrossBridgeClient, createHttpDepositSubmitter } from './services/bridgeClient';
import { ChainRegistry } from './services/chainRegistry';
import { CostModel } from './services/costModel';
import { GasPriceKeeper } from './services/gasPriceKeeper';
import { NotificationService } from './services/notificationService';
import { PriceOracle } from './services/priceOracle';
import { PriceService } from './services/priceService';
import { SwapLedger } from './services/swapLedger';
import { SwapMonitor } from './services/swapMonitor';
import { SwapOrchestrator } from './services/swapOrchestrator';

export interface AppOverrides {
  config?: AppConfig;
  chains?: ChainConfig[];
  clock?: Clock;
  priceFeed?: PriceFeedClient;
  bridge?: BridgeClient;
  ledger?: SwapLedger;
  /** Replaces the default ledger + notification listeners */
  listeners?: SwapSettlementListener[];
}

export interface App {
  access: AccessControl;
  admin: Capability;
  registry: ChainRegistry;
  oracle: PriceOracle;
  costModel: CostModel;
  bridge: BridgeClient;
  orchestrator: SwapOrchestrator;
  adminService: AdminService;
  keeper: GasPriceKeeper;
  monitor: SwapMonitor;
  notifications: NotificationService;
  ledger: SwapLedger;
}

/** Wires every service together. Tests pass overrides for the outside world. */
export function createApp(overrides: AppOverrides = {}): App {
  const appConfig = overrides.config ?? config;
  const clock = overrides.clock ?? systemClock;
  const chains = overrides.chains ?? loadChainConfigs(appConfig.chainsFile);

  const access = new AccessControl();
  const admin = access.issueAdmin('operator');
  const keeperCapability = access.rotateKeeper(admin, 'gas-price-keeper');

  const registry = new ChainRegistry(access, chains);
  const priceFeed = overrides.priceFeed ?? new PriceService(appConfig.price, clock);
  const oracle = new PriceOracle(registry, priceFeed, access, appConfig.oracle, clock);
  const costModel = new CostModel(registry, oracle, access, {
    localChainId: appConfig.localChainId,
    gasSafetyMarginBps: appConfig.cost.gasSafetyMarginBps,
    defaultGasUsageUnits: appConfig.cost.defaultGasUsageUnits,
    bridgeFees: { baseFeeUSD: appConfig.cost.baseBridgeFeeUSD, feeBps: appConfig.cost.bridgeFeeBps },
    maxSlippageBps: appConfig.cost.maxSlippageBps,
  });

  const bridge = overrides.bridge ?? new AcrossBridgeClient(
    {
      apiUrl: appConfig.bridge.apiUrl,
      originChainId: appConfig.localChainId,
      supportedChains: chains.map((chain) => chain.chainId),
    },
    createHttpDepositSubmitter(appConfig.bridge.depositSignerUrl)
  );

  const ledger = overrides.ledger ?? new SwapLedger();
  const notifications = new NotificationService(appConfig.notification);
  const listeners = overrides.listeners ?? [ledger, notifications];

  const orchestrator = new SwapOrchestrator({
    registry,
    costModel,
    bridge,
    access,
    settings: {
      escrowAddress: appConfig.escrowAddress,
      recoveryTimeoutSeconds: appConfig.orchestrator.recoveryTimeoutSeconds,
      thresholds: appConfig.thresholds,
    },
    clock,
    listeners,
  });

  const keeper = new GasPriceKeeper(registry, oracle, keeperCapability);

  return {
    access,
    admin,
    registry,
    oracle,
    costModel,
    bridge,
    orchestrator,
    adminService: new AdminService(admin, access, registry, costModel, orchestrator, keeper),
    keeper,
    monitor: new SwapMonitor(orchestrator, bridge),
    notifications,
    ledger,
  };
}
