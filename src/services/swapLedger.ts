import fs from 'fs/promises';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { z } from 'zod';
import { SwapRecord, SwapSettlementListener } from '../types';
import { KeyedMutex } from '../utils/keyedMutex';
import { logger } from '../utils/logger';
import { formatUsd } from '../utils/usd';

const DEFAULT_DATA_DIR = path.join(process.cwd(), 'data');
const LEDGER_FILE = 'swaps.json';
const CSV_FILE = 'swap_history.csv';
const EXPORT_FILE = 'completed_swaps.csv';
const WRITE_LOCK = 'ledger';

const bigintString = z.string().regex(/^-?\d+$/).transform((value) => BigInt(value));

const StoredSwapSchema = z.object({
  swapId: z.string(),
  user: z.string(),
  recipient: z.string(),
  tokenIn: z.string(),
  tokenOut: z.string(),
  amountIn: bigintString,
  minAmountOut: bigintString,
  amountOut: bigintString,
  sourceChain: z.number().int(),
  destinationChain: z.number().int(),
  initiatedAt: z.number(),
  deadline: z.number(),
  completedAt: z.number(),
  status: z.enum(['Initiated', 'Bridging', 'Swapping', 'BridgingBack', 'Completed', 'Failed', 'Recovered']),
  bridgeReferenceId: z.string(),
  returnBridgeReferenceId: z.string(),
  expectedSavingsUSD: bigintString,
  failureReason: z.string().optional(),
  refund: z.object({
    status: z.enum(['pending', 'requested', 'failed', 'notRequired']),
    referenceId: z.string().optional(),
    error: z.string().optional(),
    requestedAt: z.number(),
  }).optional(),
});

const HISTORY_HEADER = [
  { id: 'settledAt', title: 'Settled At' },
  { id: 'swapId', title: 'Swap ID' },
  { id: 'user', title: 'User' },
  { id: 'route', title: 'Route' },
  { id: 'tokenIn', title: 'Token In' },
  { id: 'tokenOut', title: 'Token Out' },
  { id: 'amountIn', title: 'Amount In' },
  { id: 'amountOut', title: 'Amount Out' },
  { id: 'savingsUSD', title: 'Expected Savings (USD)' },
  { id: 'status', title: 'Status' },
  { id: 'bridgeReference', title: 'Bridge Reference' },
  { id: 'returnReference', title: 'Return Reference' },
  { id: 'error', title: 'Error Message' },
];

function toCsvRow(record: SwapRecord): Record<string, string> {
  return {
    settledAt: new Date(record.completedAt * 1000).toISOString(),
    swapId: record.swapId,
    user: record.user,
    route: `${record.sourceChain} -> ${record.destinationChain}`,
    tokenIn: record.tokenIn,
    tokenOut: record.tokenOut,
    amountIn: record.amountIn.toString(),
    amountOut: record.amountOut.toString(),
    savingsUSD: formatUsd(record.expectedSavingsUSD),
    status: record.status,
    bridgeReference: record.bridgeReferenceId,
    returnReference: record.returnBridgeReferenceId,
    error: record.failureReason ?? record.refund?.error ?? '',
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Durable history of settled swaps: a JSON ledger keyed by swap id plus an
 * append-only CSV. Registered as a settlement listener on the orchestrator.
 */
export class SwapLedger implements SwapSettlementListener {
  private records = new Map<string, SwapRecord>();
  private readonly ledgerFile: string;
  private readonly csvFile: string;
  private initialized = false;
  private readonly writes = new KeyedMutex();

  constructor(private readonly dataDir: string = DEFAULT_DATA_DIR) {
    this.ledgerFile = path.join(dataDir, LEDGER_FILE);
    this.csvFile = path.join(dataDir, CSV_FILE);
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });

    try {
      const data = await fs.readFile(this.ledgerFile, 'utf-8');
      const stored = z.array(StoredSwapSchema).parse(JSON.parse(data));
      this.records = new Map<string, SwapRecord>(stored.map((record) => [record.swapId, record]));
      logger.info(`Loaded ${this.records.size} swaps from ledger`);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      logger.info('No existing swap ledger found, starting fresh');
      this.records = new Map<string, SwapRecord>();
      await this.save();
    }

    this.initialized = true;
  }

  /** Settlements are written one at a time, in arrival order. */
  async onSwapSettled(record: SwapRecord): Promise<void> {
    await this.writes.runExclusive(WRITE_LOCK, async () => {
      if (!this.initialized) {
        await this.initialize();
      }

      this.records.set(record.swapId, record);
      await this.save();
      await this.appendToCSV(record);
    });

    logger.info('Swap recorded in ledger', {
      swapId: record.swapId,
      status: record.status,
      savings: `$${formatUsd(record.expectedSavingsUSD)}`,
    });
  }

  async exportToCSV(filename?: string): Promise<string> {
    const exportPath = path.join(this.dataDir, filename ?? EXPORT_FILE);
    await fs.mkdir(this.dataDir, { recursive: true });

    const writer = createObjectCsvWriter({ path: exportPath, header: HISTORY_HEADER });
    const rows = this.getCompletedRecords().map(toCsvRow);
    await writer.writeRecords(rows);

    logger.info(`Exported ${rows.length} swaps to ${exportPath}`);
    return exportPath;
  }

  getRecords(): SwapRecord[] {
    return [...this.records.values()];
  }

  getCompletedRecords(): SwapRecord[] {
    return this.getRecords().filter((record) => record.status === 'Completed');
  }

  getTotalSavingsUSD(): bigint {
    return this.getCompletedRecords().reduce((sum, record) => sum + record.expectedSavingsUSD, 0n);
  }

  getTotalVolumeUSD(): bigint {
    return this.getCompletedRecords().reduce((sum, record) => sum + record.amountIn, 0n);
  }

  private async save(): Promise<void> {
    const serialized = JSON.stringify(
      this.getRecords(),
      (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
      2
    );
    await fs.writeFile(this.ledgerFile, serialized, 'utf-8');
    logger.debug('Swap ledger saved');
  }

  private async appendToCSV(record: SwapRecord): Promise<void> {
    const exists = await fs
      .access(this.csvFile)
      .then(() => true)
      .catch((error: unknown) => {
        if (isMissingFile(error)) return false;
        throw error;
      });

    // csv-writer only writes the header row when not appending
    const writer = createObjectCsvWriter({ path: this.csvFile, header: HISTORY_HEADER, append: exists });
    await writer.writeRecords([toCsvRow(record)]);
    logger.debug('Swap appended to CSV');
  }
}
