/**
 * WagerError.ts - Failure taxonomy of the wagering engine
 *
 * Every rejected operation throws a WagerError and leaves state untouched.
 */

export const ERROR_CATEGORY = {
  AUTHORIZATION: 'Authorization',
  STATE: 'State',
  VALIDATION: 'Validation',
  CONFLICT: 'Conflict',
  TRANSFER: 'Transfer',
} as const;

export type ErrorCategory = (typeof ERROR_CATEGORY)[keyof typeof ERROR_CATEGORY];

const CATEGORY_BY_CODE = {
  Unauthorized: ERROR_CATEGORY.AUTHORIZATION,

  NoActiveEvent: ERROR_CATEGORY.STATE,
  EventNotOpen: ERROR_CATEGORY.STATE,
  PriorEventUnterminated: ERROR_CATEGORY.STATE,
  BettingWindowClosed: ERROR_CATEGORY.STATE,
  WindowNotElapsed: ERROR_CATEGORY.STATE,
  AlreadyResolved: ERROR_CATEGORY.STATE,
  AlreadyTerminal: ERROR_CATEGORY.STATE,
  EventNotResolved: ERROR_CATEGORY.STATE,
  SystemPaused: ERROR_CATEGORY.STATE,
  NotPaused: ERROR_CATEGORY.STATE,
  ReentrantCall: ERROR_CATEGORY.STATE,

  InvalidAmount: ERROR_CATEGORY.VALIDATION,
  UnknownEvent: ERROR_CATEGORY.VALIDATION,
  SideConflict: ERROR_CATEGORY.VALIDATION,
  ArithmeticOverflow: ERROR_CATEGORY.VALIDATION,
  ArithmeticUnderflow: ERROR_CATEGORY.VALIDATION,

  AlreadyClaimed: ERROR_CATEGORY.CONFLICT,
  NoWinningStake: ERROR_CATEGORY.CONFLICT,
  EmptyWinningPool: ERROR_CATEGORY.CONFLICT,

  PayoutFailed: ERROR_CATEGORY.TRANSFER,
  PaymentFailed: ERROR_CATEGORY.TRANSFER,
} as const satisfies Record<string, ErrorCategory>;

export type WagerErrorCode = keyof typeof CATEGORY_BY_CODE;

export class WagerError extends Error {
  readonly code: WagerErrorCode;
  readonly category: ErrorCategory;

  constructor(code: WagerErrorCode, message: string) {
    super(message);
    this.name = 'WagerError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
  }
}

export function isWagerError(error: unknown, code?: WagerErrorCode): error is WagerError {
  return error instanceof WagerError && (code === undefined || error.code === code);
}
