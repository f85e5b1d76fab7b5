import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ChainConfig, NotificationConfig } from '../types';
import { GasOptimizerError } from '../utils/errors';
import { parseUsd } from '../utils/usd';

dotenv.config();

const usdAmount = z.string().regex(/^\d+(\.\d+)?$/, 'Expected a decimal USD amount').transform(parseUsd);
const weiAmount = z.string().regex(/^\d+$/, 'Expected an integer wei amount').transform((value) => BigInt(value));
const bps = z.number().int().min(0).max(10_000);

const ConfigSchema = z.object({
  localChainId: z.number().int().positive(),
  chainsFile: z.string(),
  escrowAddress: z.string().min(1),
  oracle: z.object({
    minGasPrice: weiAmount,
    maxGasPrice: weiAmount,
    stalenessThresholdSeconds: z.number().int().positive(),
    feedMaxAgeSeconds: z.number().int().positive(),
    historySize: z.number().int().positive(),
  }).refine(data => data.minGasPrice <= data.maxGasPrice, {
    message: 'MIN_GAS_PRICE_WEI must not exceed MAX_GAS_PRICE_WEI',
  }),
  cost: z.object({
    gasSafetyMarginBps: z.number().int().min(10_000),
    defaultGasUsageUnits: weiAmount,
    baseBridgeFeeUSD: usdAmount,
    bridgeFeeBps: bps,
    maxSlippageBps: bps,
  }),
  thresholds: z.object({
    minSavingsBps: bps,
    minAbsoluteSavingsUSD: usdAmount,
    maxBridgeTimeSeconds: z.number().int().positive(),
  }),
  orchestrator: z.object({
    recoveryTimeoutSeconds: z.number().int().positive(),
  }),
  schedule: z.object({
    keeper: z.string(),
    monitor: z.string(),
    summary: z.string(),
  }),
  price: z.object({
    cacheDuration: z.number(),
    coingeckoApiUrl: z.string().url(),
    coinpaprikaApiUrl: z.string().url(),
  }),
  bridge: z.object({
    apiUrl: z.string().url(),
    depositSignerUrl: z.string().url().optional(),
  }),
  notification: z.object({
    discordWebhook: z.string().url().optional(),
    telegramBotToken: z.string().optional(),
    telegramChatId: z.string().optional(),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    toFile: z.boolean(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadConfig(): AppConfig {
  const config = {
    localChainId: parseInt(process.env.LOCAL_CHAIN_ID || '1'),
    chainsFile: process.env.CHAINS_FILE || path.join(process.cwd(), 'config', 'chains.json'),
    escrowAddress: process.env.ESCROW_ADDRESS || '0x0000000000000000000000000000000000000001',
    oracle: {
      minGasPrice: process.env.MIN_GAS_PRICE_WEI || '1',
      maxGasPrice: process.env.MAX_GAS_PRICE_WEI || '10000000000000',
      stalenessThresholdSeconds: parseInt(process.env.GAS_PRICE_STALENESS_SECONDS || '600'),
      feedMaxAgeSeconds: parseInt(process.env.PRICE_FEED_MAX_AGE_SECONDS || '3600'),
      historySize: parseInt(process.env.GAS_PRICE_HISTORY_SIZE || '24'),
    },
    cost: {
      gasSafetyMarginBps: parseInt(process.env.GAS_SAFETY_MARGIN_BPS || '12000'),
      defaultGasUsageUnits: process.env.DEFAULT_SWAP_GAS_UNITS || '150000',
      baseBridgeFeeUSD: process.env.BASE_BRIDGE_FEE_USD || '1',
      bridgeFeeBps: parseInt(process.env.BRIDGE_FEE_BPS || '10'),
      maxSlippageBps: parseInt(process.env.MAX_SLIPPAGE_BPS || '300'),
    },
    thresholds: {
      minSavingsBps: parseInt(process.env.MIN_SAVINGS_BPS || '500'),
      minAbsoluteSavingsUSD: process.env.MIN_ABSOLUTE_SAVINGS_USD || '10',
      maxBridgeTimeSeconds: parseInt(process.env.MAX_BRIDGE_TIME_SECONDS || '1800'),
    },
    orchestrator: {
      recoveryTimeoutSeconds: parseInt(process.env.RECOVERY_TIMEOUT_SECONDS || '3600'),
    },
    schedule: {
      keeper: process.env.KEEPER_SCHEDULE || '* * * * *',
      monitor: process.env.MONITOR_SCHEDULE || '*/30 * * * * *',
      summary: process.env.SUMMARY_SCHEDULE || '0 0 * * *',
    },
    price: {
      cacheDuration: parseInt(process.env.PRICE_CACHE_DURATION_MINUTES || '5'),
      coingeckoApiUrl: process.env.COINGECKO_API_URL || 'https://api.coingecko.com/api/v3',
      coinpaprikaApiUrl: process.env.COINPAPRIKA_API_URL || 'https://api.coinpaprika.com/v1',
    },
    bridge: {
      apiUrl: process.env.BRIDGE_API_URL || 'https://app.across.to/api',
      depositSignerUrl: process.env.DEPOSIT_SIGNER_URL,
    },
    notification: {
      discordWebhook: process.env.DISCORD_WEBHOOK_URL,
      telegramBotToken: process.env.TELEGRAM_BOT_TOKEN,
      telegramChatId: process.env.TELEGRAM_CHAT_ID,
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      toFile: process.env.LOG_TO_FILE !== 'false',
    },
  };

  return ConfigSchema.parse(config);
}

export const config = loadConfig();

export const notificationConfig: NotificationConfig = {
  discordWebhook: config.notification.discordWebhook,
  telegramBotToken: config.notification.telegramBotToken,
  telegramChatId: config.notification.telegramChatId,
};

// Chain metadata lives in a JSON file; gas amounts are strings there since JSON has no bigint.
const ChainFileSchema = z.array(z.object({
  chainId: z.number().int().positive(),
  name: z.string().min(1),
  nativeAsset: z.string().min(1),
  enabled: z.boolean().default(true),
  blockTimeSeconds: z.number().positive(),
  finalityTimeSeconds: z.number().positive(),
  estimatedBridgeTimeSeconds: z.number().int().nonnegative(),
  maxAcceptableGasPrice: weiAmount,
  congestion: z.object({
    low: weiAmount,
    medium: weiAmount,
    high: weiAmount,
  }),
  rpcUrl: z.string().url().optional(),
  liquidityDepthUSD: usdAmount.optional(),
}));

export function parseChainConfigs(raw: unknown): ChainConfig[] {
  const result = ChainFileSchema.safeParse(raw);
  if (!result.success) {
    throw new GasOptimizerError('InvalidConfiguration', `Invalid chain configuration: ${result.error.message}`);
  }
  return result.data;
}

export function loadChainConfigs(file: string = config.chainsFile): ChainConfig[] {
  const contents = fs.readFileSync(file, 'utf-8');
  return parseChainConfigs(JSON.parse(contents));
}
