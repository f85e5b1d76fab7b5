import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { SwapMonitor } from '../../src/services/swapMonitor';
import {
  createTestEnvironment,
  RecordingListener,
  seedCheapCandidate,
  START_TIME,
  TestEnvironment,
  usd,
  USER,
} from '../helpers/fixtures';

async function startSwap(env: TestEnvironment): Promise<string> {
  const result = await env.orchestrator.initiate({
    user: USER,
    tokenIn: 'USDC',
    tokenOut: 'WETH',
    amountIn: usd(1000),
    deadline: START_TIME + 600,
  });
  if (result.kind !== 'crossChain') {
    throw new Error('expected a cross-chain swap');
  }
  return result.record.swapId;
}

const pending = { completed: false, failed: false, filledAmount: 0n };

describe('SwapMonitor', () => {
  let env: TestEnvironment;
  let listener: RecordingListener;
  let monitor: SwapMonitor;

  beforeEach(() => {
    listener = new RecordingListener();
    env = createTestEnvironment({ listeners: [listener] });
    seedCheapCandidate(env);
    monitor = new SwapMonitor(env.orchestrator, env.bridge);
  });

  it('should fail swaps whose outbound transfer failed', async () => {
    const swapId = await startSwap(env);
    env.bridge.statuses.set('1:1', { ...pending, failed: true });

    const result = await monitor.reconcile();

    expect(result).toEqual({ checked: 1, completed: [], failed: [swapId], errors: [] });
    expect(env.orchestrator.getSwap(swapId).status).toBe('Failed');
    expect(env.orchestrator.getSwap(swapId).failureReason).toBe('outbound bridge transfer 1:1 failed');
    expect(listener.settled).toEqual([`${swapId}:Failed`]);
  });

  it('should leave a filled outbound transfer for the destination swap', async () => {
    const swapId = await startSwap(env);
    env.bridge.statuses.set('1:1', { completed: true, failed: false, filledAmount: usd(999) });

    const result = await monitor.reconcile();

    expect(result.checked).toBe(1);
    expect(result.completed).toEqual([]);
    expect(env.orchestrator.getSwap(swapId).status).toBe('Bridging');
  });

  it('should complete swaps once the return transfer is filled', async () => {
    const swapId = await startSwap(env);
    await env.orchestrator.handleDestinationSwap(swapId, { success: true, amountOut: 500n });
    expect(env.orchestrator.getSwap(swapId).returnBridgeReferenceId).toBe('42161:2');

    expect((await monitor.reconcile()).completed).toEqual([]);

    env.bridge.statuses.set('42161:2', { completed: true, failed: false, filledAmount: 500n });
    const result = await monitor.reconcile();

    expect(result).toEqual({ checked: 1, completed: [swapId], failed: [], errors: [] });
    expect(env.orchestrator.getSwap(swapId).status).toBe('Completed');
    expect(env.orchestrator.getGlobalStatistics().successfulSwaps).toBe(1);
  });

  it('should fail swaps whose return transfer failed', async () => {
    const swapId = await startSwap(env);
    await env.orchestrator.handleDestinationSwap(swapId, { success: true, amountOut: 500n });
    env.bridge.statuses.set('42161:2', { ...pending, failed: true });

    const result = await monitor.reconcile();

    expect(result.failed).toEqual([swapId]);
    expect(env.orchestrator.getSwap(swapId).failureReason).toBe('return bridge transfer 42161:2 failed');
  });

  it('should collect status errors and keep going', async () => {
    const failing = await startSwap(env);
    const healthy = await startSwap(env);
    env.bridge.statuses.set('1:2', { ...pending, failed: true });
    jest.spyOn(env.bridge, 'status').mockRejectedValueOnce(new Error('bridge api down'));

    const result = await monitor.reconcile();

    expect(result.checked).toBe(2);
    expect(result.errors).toEqual([{ swapId: failing, error: 'bridge api down' }]);
    expect(result.failed).toEqual([healthy]);
    expect(env.orchestrator.getSwap(failing).status).toBe('Bridging');
  });

  it('should skip a pass while another is in progress', async () => {
    await startSwap(env);

    const [first, second] = await Promise.all([monitor.reconcile(), monitor.reconcile()]);

    expect(first.checked).toBe(1);
    expect(second).toEqual({ checked: 0, completed: [], failed: [], errors: [] });
  });
});
