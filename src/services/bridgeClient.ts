import axios from 'axios';
import {
  BridgeClient,
  BridgeQuote,
  BridgeTransferRequest,
  BridgeTransferStatus,
  ChainId,
} from '../types';
import { BridgeError, BridgeFailureReason, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface AcrossBridgeSettings {
  apiUrl: string;
  /** Chain deposits are made from when quoting */
  originChainId: ChainId;
  /** Chains the bridge can reach; every other chain is rejected before any request */
  supportedChains: ChainId[];
  timeoutMs?: number;
}

/**
 * Signs and broadcasts the deposit for a transfer. Signing is a wallet
 * concern, so the client only needs the resulting deposit id.
 */
export type DepositSubmitter = (request: BridgeTransferRequest) => Promise<{ depositId: string }>;

interface SuggestedFeesResponse {
  totalRelayFee: { pct: string; total: string };
  estimatedFillTimeSec?: number;
  isAmountTooLow?: boolean;
  limits?: { minDeposit: string; maxDeposit: string };
}

interface DepositStatusResponse {
  status: 'pending' | 'filled' | 'expired' | 'refunded' | 'slowFillRequested';
  fillTx?: string;
  outputAmount?: string;
}

interface AcrossErrorBody {
  code?: string;
  message?: string;
}

const AMOUNT_ERROR_CODES = new Set(['AMOUNT_TOO_LOW', 'AMOUNT_TOO_HIGH', 'INVALID_AMOUNT']);
const ROUTE_ERROR_CODES = new Set(['ROUTE_NOT_ENABLED', 'UNSUPPORTED_ROUTE', 'INVALID_CHAIN']);

function toBridgeError(operation: string, error: unknown): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }

  let reason: BridgeFailureReason = 'Transport';
  let message = describeError(error);
  if (axios.isAxiosError<AcrossErrorBody>(error)) {
    const body = error.response?.data;
    if (body?.code && AMOUNT_ERROR_CODES.has(body.code)) {
      reason = 'AmountOutOfBounds';
    } else if (body?.code && ROUTE_ERROR_CODES.has(body.code)) {
      reason = 'UnsupportedChain';
    }
    message = body?.message ?? message;
  }

  return new BridgeError(reason, `Bridge ${operation} failed: ${message}`);
}

export function parseReferenceId(referenceId: string): { originChainId: ChainId; depositId: string } {
  const separator = referenceId.indexOf(':');
  const originChainId = Number(referenceId.slice(0, separator));
  const depositId = referenceId.slice(separator + 1);
  if (separator <= 0 || !Number.isInteger(originChainId) || depositId.length === 0) {
    throw new BridgeError('Transport', `Malformed bridge reference id "${referenceId}"`);
  }
  return { originChainId, depositId };
}

/**
 * Bridge client for an Across-style intent bridge: fee quotes and fill status
 * come from the bridge's HTTP API, deposits go through a {@link DepositSubmitter}.
 */
export class AcrossBridgeClient implements BridgeClient {
  private readonly supported: Set<ChainId>;

  constructor(
    private readonly settings: AcrossBridgeSettings,
    private readonly submitDeposit: DepositSubmitter
  ) {
    this.supported = new Set(settings.supportedChains);
  }

  async quote(token: string, amount: bigint, destinationChain: ChainId): Promise<BridgeQuote> {
    this.assertSupported(destinationChain);

    try {
      const response = await axios.get<SuggestedFeesResponse>(`${this.settings.apiUrl}/suggested-fees`, {
        params: {
          inputToken: token,
          outputToken: token,
          originChainId: this.settings.originChainId,
          destinationChainId: destinationChain,
          amount: amount.toString(),
        },
        timeout: this.settings.timeoutMs,
      });
      const data = response.data;

      if (data.isAmountTooLow) {
        throw new BridgeError('AmountOutOfBounds', `Amount ${amount} is below the bridge minimum`, { destinationChain });
      }
      if (data.limits && (amount < BigInt(data.limits.minDeposit) || amount > BigInt(data.limits.maxDeposit))) {
        throw new BridgeError('AmountOutOfBounds', `Amount ${amount} is outside [${data.limits.minDeposit}, ${data.limits.maxDeposit}]`, {
          destinationChain,
        });
      }

      const quote = {
        feeUSD: BigInt(data.totalRelayFee.total),
        estimatedTimeSeconds: data.estimatedFillTimeSec ?? 0,
      };
      logger.debug('Bridge quote received', { token, destinationChain, ...quote });
      return quote;
    } catch (error) {
      throw toBridgeError('quote', error);
    }
  }

  async transfer(request: BridgeTransferRequest): Promise<string> {
    this.assertSupported(request.originChain);
    this.assertSupported(request.destinationChain);
    if (request.amount <= 0n) {
      throw new BridgeError('AmountOutOfBounds', 'Transfer amount must be positive');
    }

    try {
      const { depositId } = await this.submitDeposit(request);
      const referenceId = `${request.originChain}:${depositId}`;
      logger.info('Bridge deposit submitted', {
        referenceId,
        token: request.token,
        amount: request.amount,
        destinationChain: request.destinationChain,
      });
      return referenceId;
    } catch (error) {
      throw toBridgeError('transfer', error);
    }
  }

  async status(bridgeReferenceId: string): Promise<BridgeTransferStatus> {
    const { originChainId, depositId } = parseReferenceId(bridgeReferenceId);

    try {
      const response = await axios.get<DepositStatusResponse>(`${this.settings.apiUrl}/deposit/status`, {
        params: { originChainId, depositId },
        timeout: this.settings.timeoutMs,
      });
      const { status, outputAmount } = response.data;

      return {
        completed: status === 'filled',
        failed: status === 'expired' || status === 'refunded',
        filledAmount: status === 'filled' && outputAmount ? BigInt(outputAmount) : 0n,
      };
    } catch (error) {
      throw toBridgeError('status', error);
    }
  }

  private assertSupported(chainId: ChainId): void {
    if (!this.supported.has(chainId)) {
      throw new BridgeError('UnsupportedChain', `Chain ${chainId} is not reachable through the bridge`, { chainId });
    }
  }
}

/** Submits deposits to an external signing service over HTTP. */
export function createHttpDepositSubmitter(signerUrl?: string): DepositSubmitter {
  return async (request) => {
    if (!signerUrl) {
      throw new BridgeError('Transport', 'No deposit signer configured (set DEPOSIT_SIGNER_URL)');
    }
    const response = await axios.post<{ depositId: string }>(`${signerUrl}/deposits`, {
      ...request,
      amount: request.amount.toString(),
    });
    return { depositId: response.data.depositId };
  };
}
