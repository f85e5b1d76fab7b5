export type ErrorCategory = 'validation' | 'staleness' | 'state' | 'external';

export type ErrorCode =
  | 'InvalidUser'
  | 'InvalidAmount'
  | 'DeadlineExpired'
  | 'InvalidDestinationChain'
  | 'UnknownChain'
  | 'PriceOutOfBounds'
  | 'InvalidConfiguration'
  | 'StalePrice'
  | 'PriceFeedUnavailable'
  | 'InvalidStateTransition'
  | 'SwapNotActive'
  | 'SwapNotFound'
  | 'RecoveryNotAllowed'
  | 'Unauthorized'
  | 'OperationsPaused'
  | 'BridgeError';

const CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  InvalidUser: 'validation',
  InvalidAmount: 'validation',
  DeadlineExpired: 'validation',
  InvalidDestinationChain: 'validation',
  UnknownChain: 'validation',
  PriceOutOfBounds: 'validation',
  InvalidConfiguration: 'validation',
  StalePrice: 'staleness',
  PriceFeedUnavailable: 'staleness',
  InvalidStateTransition: 'state',
  SwapNotActive: 'state',
  SwapNotFound: 'state',
  RecoveryNotAllowed: 'state',
  Unauthorized: 'state',
  OperationsPaused: 'state',
  BridgeError: 'external',
};

/**
 * Base class for every error the optimizer raises.
 *
 * Callers branch on `code` (or `category`), never on the message.
 *
 * @example
 * ```typescript
 * throw new GasOptimizerError('StalePrice', 'Gas price for chain 10 is 900s old', { chainId: 10 });
 * ```
 */
export class GasOptimizerError extends Error {
  readonly category: ErrorCategory;
  readonly retryable: boolean;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'GasOptimizerError';
    this.category = CATEGORIES[code];
    this.retryable = this.category === 'staleness' || this.category === 'external';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type BridgeFailureReason = 'UnsupportedChain' | 'AmountOutOfBounds' | 'Transport';

/**
 * Failure reported by a bridge collaborator. Always drives the affected swap to `Failed`.
 */
export class BridgeError extends GasOptimizerError {
  constructor(
    public readonly reason: BridgeFailureReason,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super('BridgeError', message, { ...details, reason });
    this.name = 'BridgeError';
  }
}

export function isGasOptimizerError(error: unknown, code?: ErrorCode): error is GasOptimizerError {
  return error instanceof GasOptimizerError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
