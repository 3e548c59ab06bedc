export type ErrorCategory =
  | 'ValidationError'
  | 'InsufficientResource'
  | 'InvalidStateTransition'
  | 'AuthorizationError'
  | 'GameLifecycleError';

const CATEGORY_BY_CODE = {
  InvalidQuantity: 'ValidationError',
  InvalidPrice: 'ValidationError',
  InvalidAdjustment: 'ValidationError',
  TeamNotFound: 'ValidationError',
  OfferNotFound: 'ValidationError',
  RequestNotFound: 'ValidationError',
  SelfTrade: 'ValidationError',
  IndustryMismatch: 'ValidationError',
  DuplicateTeam: 'ValidationError',

  InsufficientFunds: 'InsufficientResource',
  InsufficientInventory: 'InsufficientResource',
  InsufficientRawMaterials: 'InsufficientResource',

  OfferNotOpen: 'InvalidStateTransition',
  OfferPartiallyFilled: 'InvalidStateTransition',
  RequestNotPending: 'InvalidStateTransition',
  GiftAlreadyGranted: 'InvalidStateTransition',
  InvalidStatusTransition: 'InvalidStateTransition',

  AdminOnly: 'AuthorizationError',
  TeamOnly: 'AuthorizationError',
  NotOwner: 'AuthorizationError',
  NotCounterparty: 'AuthorizationError',
  NotProposer: 'AuthorizationError',
  NotTeamMember: 'AuthorizationError',

  GameNotRunning: 'GameLifecycleError',
  GameEnded: 'GameLifecycleError',
  GameNotInSetup: 'GameLifecycleError',
} as const satisfies Record<string, ErrorCategory>;

export type FailureCode = keyof typeof CATEGORY_BY_CODE;

export interface EngineFailure {
  code: FailureCode;
  category: ErrorCategory;
  message: string;
}

export type EngineResult<T> =
  | { success: true; data: T }
  | { success: false; error: EngineFailure };

/**
 * Thrown inside a ledger transaction to abort it. The store rolls back and
 * the engine turns the error into a failed EngineResult.
 */
export class EngineError extends Error {
  public readonly code: FailureCode;
  public readonly category: ErrorCategory;

  constructor(code: FailureCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
  }

  toFailure(): EngineFailure {
    return { code: this.code, category: this.category, message: this.message };
  }
}
