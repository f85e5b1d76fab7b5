import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import axios from 'axios';
import { App, createApp } from '../../src/app';
import {
  ARBITRUM,
  FakeBridge,
  LOCAL_CHAIN,
  makeChain,
  ManualClock,
  RecordingListener,
  START_TIME,
  StaticPriceFeed,
  usd,
  USER,
} from '../helpers/fixtures';

jest.mock('axios');
const mockedAxios = jest.mocked(axios);

describe('createApp', () => {
  let clock: ManualClock;
  let bridge: FakeBridge;
  let listener: RecordingListener;
  let app: App;

  beforeEach(() => {
    jest.resetAllMocks();
    clock = new ManualClock();
    bridge = new FakeBridge();
    listener = new RecordingListener();
    const priceFeed = new StaticPriceFeed(clock.clock);
    priceFeed.set('ethereum', usd(1000));

    app = createApp({
      chains: [makeChain(LOCAL_CHAIN, { rpcUrl: 'https://rpc.test/1' }), makeChain(ARBITRUM, { rpcUrl: 'https://rpc.test/42161' })],
      clock: clock.clock,
      priceFeed,
      bridge,
      listeners: [listener],
    });
  });

  it('should run a swap from quote to completion', async () => {
    const keeper = app.adminService.rotateKeeper('test-keeper');
    app.oracle.update(keeper, LOCAL_CHAIN, 500_000_000_000n);
    app.oracle.update(keeper, ARBITRUM, 10_000_000_000n);

    // $90 local against $1.80 of gas plus a $2 bridge fee, with the default 1.2x margin and 10 bps fee
    const quote = await app.orchestrator.quote({ user: USER, tokenIn: 'USDC', tokenOut: 'WETH', amountIn: usd(1000) });
    expect(quote).toMatchObject({ optimizedChain: ARBITRUM, savingsUSD: 86_200_000_000_000_000_000n, savingsBps: 9577 });

    const started = await app.orchestrator.initiate({
      user: USER,
      tokenIn: 'USDC',
      tokenOut: 'WETH',
      amountIn: usd(1000),
      deadline: START_TIME + 600,
    });
    if (started.kind !== 'crossChain') {
      throw new Error('expected a cross-chain swap');
    }
    const swapId = started.record.swapId;

    await app.orchestrator.handleDestinationSwap(swapId, { success: true, amountOut: 500n });
    bridge.statuses.set('42161:2', { completed: true, failed: false, filledAmount: 500n });
    const reconciled = await app.monitor.reconcile();

    expect(reconciled.completed).toEqual([swapId]);
    expect(listener.settled).toEqual([`${swapId}:Completed`]);
    expect(app.orchestrator.getUserSavings(USER)).toBe(86_200_000_000_000_000_000n);
  });

  it('should keep the scheduled keeper writing prices after a keeper rotation', async () => {
    mockedAxios.post
      .mockResolvedValueOnce({ data: { jsonrpc: '2.0', id: 1, result: '0x746a528800' } })
      .mockResolvedValueOnce({ data: { jsonrpc: '2.0', id: 1, result: '0x2540be400' } });

    app.adminService.rotateKeeper('backup-keeper');
    const result = await app.keeper.run();

    expect(result).toEqual({ updated: [LOCAL_CHAIN, ARBITRUM], failed: [], skipped: false });
    expect(app.oracle.get(LOCAL_CHAIN).price).toBe(500_000_000_000n);
    expect(app.oracle.get(ARBITRUM).price).toBe(10_000_000_000n);
    expect(mockedAxios.post).toHaveBeenCalledWith(
      'https://rpc.test/42161',
      { jsonrpc: '2.0', id: 1, method: 'eth_gasPrice', params: [] },
      { headers: { 'Content-Type': 'application/json' }, timeout: 10_000 }
    );
  });
});
