/**
 * Error types raised by the rules engine.
 *
 * Construction errors (board, hand, deck, card) mean the caller built an
 * invalid object and must not continue with it. `InputError` is an expected,
 * player-facing rejection of a move. `InvariantError` is a bug in the caller
 * or in this package and must never be swallowed.
 */

export class GameLogicError<C extends string = string> extends Error {
  readonly code: C;

  constructor(code: C, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type BoardErrorCode = 'NO_ROWS' | 'EMPTY_ROWS' | 'TOO_LARGE' | 'MISMATCHED_ROW_LENGTHS';

export class BoardError extends GameLogicError<BoardErrorCode> {}

export type PositionErrorCode = 'OUT_OF_BOUNDS' | 'OVERFLOW' | 'UNSAFE_INTEGER';

export class PositionError extends GameLogicError<PositionErrorCode> {}

export type CardErrorCode = 'INVALID_GRID';

export class CardError extends GameLogicError<CardErrorCode> {}

export type DeckErrorCode = 'INVALID_DECK_SIZE';

export class DeckError extends GameLogicError<DeckErrorCode> {}

export type HandErrorCode = 'DUPLICATE_CARDS' | 'INVALID_DECK_INDEX';

export class HandError extends GameLogicError<HandErrorCode> {}

export type InputErrorCode =
  | 'INSUFFICIENT_SPECIAL'
  | 'INVALID_POSITION'
  | 'SPECIAL_COLLISION'
  | 'SPECIAL_NOT_ADJACENT'
  | 'INK_COLLISION'
  | 'INK_NOT_ADJACENT';

export class InputError extends GameLogicError<InputErrorCode> {}

export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}
