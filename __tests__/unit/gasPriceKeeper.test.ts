import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import axios from 'axios';
import { GasPriceKeeper } from '../../src/services/gasPriceKeeper';
import { ARBITRUM, createTestEnvironment, LOCAL_CHAIN, makeChain, rejectedCode, TestEnvironment } from '../helpers/fixtures';

jest.mock('axios');
const mockedAxios = jest.mocked(axios);

describe('GasPriceKeeper', () => {
  let env: TestEnvironment;
  let keeper: GasPriceKeeper;

  beforeEach(() => {
    jest.resetAllMocks();
    env = createTestEnvironment({
      chains: [
        makeChain(LOCAL_CHAIN, { rpcUrl: 'https://rpc.one.test' }),
        makeChain(10),
        makeChain(ARBITRUM, { rpcUrl: 'https://rpc.arbitrum.test' }),
      ],
    });
    keeper = new GasPriceKeeper(env.registry, env.oracle, env.keeper, 2_000);
  });

  it('should query eth_gasPrice over JSON-RPC', async () => {
    mockedAxios.post.mockResolvedValueOnce({ data: { jsonrpc: '2.0', id: 1, result: '0x174876e800' } });

    await expect(keeper.fetchGasPrice(env.registry.get(LOCAL_CHAIN))).resolves.toBe(100_000_000_000n);
    expect(mockedAxios.post).toHaveBeenCalledWith(
      'https://rpc.one.test',
      { jsonrpc: '2.0', id: 1, method: 'eth_gasPrice', params: [] },
      { headers: { 'Content-Type': 'application/json' }, timeout: 2_000 }
    );
  });

  it('should refuse chains without an RPC endpoint', async () => {
    await expect(rejectedCode(keeper.fetchGasPrice(env.registry.get(10)))).resolves.toBe('InvalidConfiguration');
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });

  it('should update every chain it can and report the rest', async () => {
    mockedAxios.post
      .mockResolvedValueOnce({ data: { jsonrpc: '2.0', id: 1, result: '0x174876e800' } })
      .mockResolvedValueOnce({ data: { jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'header not found' } } });

    const result = await keeper.run();

    expect(result).toEqual({
      updated: [LOCAL_CHAIN],
      failed: [{ chainId: ARBITRUM, error: 'eth_gasPrice failed on chain 42161: header not found' }],
      skipped: false,
    });
    expect(mockedAxios.post).toHaveBeenCalledTimes(2);
    expect(env.oracle.get(LOCAL_CHAIN).price).toBe(100_000_000_000n);
    expect(env.oracle.history(ARBITRUM)).toEqual([]);
  });

  it('should report prices the oracle rejects', async () => {
    mockedAxios.post
      .mockResolvedValueOnce({ data: { jsonrpc: '2.0', id: 1, result: '0x0' } })
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    const result = await keeper.run();

    expect(result.updated).toEqual([]);
    expect(result.failed.map((failure) => failure.chainId)).toEqual([LOCAL_CHAIN, ARBITRUM]);
    expect(result.failed[1].error).toBe('connect ECONNREFUSED');
  });

  it('should use a rotated keeper capability once it is handed over', async () => {
    const rotated = env.access.rotateKeeper(env.admin, 'next-keeper');
    mockedAxios.post.mockResolvedValue({ data: { jsonrpc: '2.0', id: 1, result: '0x3b9aca00' } });

    const stale = await keeper.run();
    expect(stale.updated).toEqual([]);
    expect(stale.failed).toHaveLength(2);

    keeper.setCapability(rotated);
    const fresh = await keeper.run();
    expect(fresh.updated).toEqual([LOCAL_CHAIN, ARBITRUM]);
    expect(env.oracle.get(ARBITRUM).price).toBe(1_000_000_000n);
  });

  it('should skip a run while another is in progress', async () => {
    mockedAxios.post.mockResolvedValue({ data: { jsonrpc: '2.0', id: 1, result: '0x3b9aca00' } });

    const [first, second] = await Promise.all([keeper.run(), keeper.run()]);

    expect(first.skipped).toBe(false);
    expect(second).toEqual({ updated: [], failed: [], skipped: true });
  });
});
