#!/usr/bin/env node
import { schedule, ScheduledTask } from 'node-cron';
import { createApp, App } from './app';
import { config } from './config';
import { logError, logger } from './utils/logger';
import { formatUsd, parseUsd } from './utils/usd';

class GasOptimizerService {
  private app: App;
  private tasks: ScheduledTask[] = [];

  constructor() {
    this.app = createApp();
  }

  async start(): Promise<void> {
    logger.info('Starting cross-chain gas optimizer...');

    await this.app.ledger.initialize();

    logger.info('Fetching initial gas prices...');
    await this.app.keeper.run();

    this.setupScheduler();
    this.setupShutdownHandlers();

    logger.info('Gas optimizer started', {
      localChainId: config.localChainId,
      chains: this.app.registry.listEnabled().map((chain) => chain.chainId),
      keeperSchedule: config.schedule.keeper,
      monitorSchedule: config.schedule.monitor,
      summarySchedule: config.schedule.summary,
    });
  }

  async quote(args: string[]): Promise<void> {
    const [tokenIn, tokenOut, amount, user = 'cli'] = args;
    if (!tokenIn || !tokenOut || !amount) {
      console.log('Usage: quote <tokenIn> <tokenOut> <amountUSD> [user]');
      process.exitCode = 1;
      return;
    }

    await this.app.keeper.run();
    const quote = await this.app.orchestrator.quote({ user, tokenIn, tokenOut, amountIn: parseUsd(amount) });

    console.log('\nOptimization Quote');
    console.log('==================');
    console.log(`Original Chain: ${quote.originalChain}`);
    console.log(`Optimized Chain: ${quote.optimizedChain}`);
    console.log(`Should Optimize: ${quote.shouldOptimize}`);
    console.log(`Expected Savings: $${formatUsd(quote.savingsUSD)} (${quote.savingsBps} bps)`);
    console.log(`Estimated Bridge Time: ${quote.estimatedBridgeTime}s`);
    if (quote.reason) {
      console.log(`Reason: ${quote.reason}`);
    }
  }

  async status(): Promise<void> {
    await this.app.ledger.initialize();
    await this.app.keeper.run();

    const { registry, oracle, orchestrator, ledger } = this.app;
    const thresholds = orchestrator.getThresholds();

    console.log('\nGas Optimizer Status');
    console.log('====================');
    console.log('\nChains:');
    for (const chain of registry.list()) {
      const sample = oracle.snapshot([chain.chainId]).get(chain.chainId);
      const gas = sample ? `${sample.price} wei (${oracle.congestion(chain.chainId)})` : 'no sample';
      console.log(`  ${chain.name} [${chain.chainId}]${chain.enabled ? '' : ' (disabled)'}: ${gas}`);
    }
    console.log('\nLedger:');
    console.log(`  Settled Swaps: ${ledger.getRecords().length}`);
    console.log(`  Completed: ${ledger.getCompletedRecords().length}`);
    console.log(`  Total Volume (USD): $${formatUsd(ledger.getTotalVolumeUSD())}`);
    console.log(`  Total Savings (USD): $${formatUsd(ledger.getTotalSavingsUSD())}`);
    console.log('\nConfiguration:');
    console.log(`  Local Chain: ${config.localChainId}`);
    console.log(`  Min Savings: ${thresholds.minSavingsBps} bps / $${formatUsd(thresholds.minAbsoluteSavingsUSD)}`);
    console.log(`  Max Bridge Time: ${thresholds.maxBridgeTimeSeconds}s`);
    console.log(`  Recovery Timeout: ${config.orchestrator.recoveryTimeoutSeconds}s`);
  }

  async exportHistory(): Promise<void> {
    const { ledger } = this.app;
    await ledger.initialize();

    const csvPath = await ledger.exportToCSV();
    console.log(`✅ Swaps exported successfully to: ${csvPath}`);

    console.log('\nSummary:');
    console.log(`Settled Swaps: ${ledger.getRecords().length}`);
    console.log(`Completed: ${ledger.getCompletedRecords().length}`);
    console.log(`Total Volume: $${formatUsd(ledger.getTotalVolumeUSD())}`);
    console.log(`Total Savings: $${formatUsd(ledger.getTotalSavingsUSD())}`);
  }

  private setupScheduler(): void {
    this.stopScheduler();

    this.tasks.push(
      schedule(config.schedule.keeper, () => {
        this.app.keeper.run().catch((error: unknown) => logError('Scheduled gas price update failed', error));
      }),
      schedule(config.schedule.monitor, () => {
        this.app.monitor.reconcile().catch((error: unknown) => logError('Scheduled swap reconciliation failed', error));
      }),
      schedule(config.schedule.summary, () => {
        this.app.notifications
          .sendDailySummary(this.app.orchestrator.getGlobalStatistics())
          .catch((error: unknown) => logError('Daily summary failed', error));
      })
    );

    logger.info('Scheduler started');
  }

  private stopScheduler(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      this.stopScheduler();

      const active = this.app.orchestrator.listActiveSwaps();
      if (active.length > 0) {
        logger.warn(`${active.length} swaps are still in flight`, { swapIds: active.map((record) => record.swapId) });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      const csvPath = await this.app.ledger.exportToCSV(`swap_history_${timestamp}.csv`);
      logger.info(`Final swap history exported to: ${csvPath}`);
      process.exit(0);
    };

    const handle = (signal: string) => {
      shutdown(signal).catch((error: unknown) => {
        logError('Shutdown failed', error);
        process.exit(1);
      });
    };
    process.on('SIGTERM', () => handle('SIGTERM'));
    process.on('SIGINT', () => handle('SIGINT'));
  }
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);
  const service = new GasOptimizerService();

  switch (command) {
    case 'quote':
      await service.quote(args);
      break;
    case 'status':
      await service.status();
      break;
    case 'export':
      await service.exportHistory();
      break;
    default:
      await service.start();
  }
}

main().catch((error: unknown) => {
  logError('Command failed', error);
  process.exit(1);
});
