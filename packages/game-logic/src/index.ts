export type {
  Action,
  BoardPosition,
  BoardSpace,
  Card,
  CardCell,
  Grid,
  HandSlot,
  InkType,
  Outcome,
  PlayerNum,
  PlayerView,
  RawInput,
  Rotation,
  RotationSteps,
} from './types.js';
export { PLAYER_NUMS, otherPlayer } from './types.js';
export {
  GameLogicError,
  BoardError,
  PositionError,
  CardError,
  DeckError,
  HandError,
  InputError,
  InvariantError,
} from './errors.js';
export type {
  BoardErrorCode,
  PositionErrorCode,
  CardErrorCode,
  DeckErrorCode,
  HandErrorCode,
  InputErrorCode,
} from './errors.js';
export { Board, MAX_BOARD_WIDTH, MAX_BOARD_HEIGHT, createDefaultBoard, isInk, isSpecial, isInactiveSpecial } from './board.js';
export { CARD_WIDTH, parseGrid, rotateCard, rotateGridCcw, rotationSteps, countInkCells } from './card.js';
export { STARTER_DECK } from './cards.js';
export { Deck, Hand, DECK_SIZE, HAND_SIZE } from './deck.js';
export type { DrawRng, Four } from './rng.js';
export { CryptoDrawRng, SeededDrawRng } from './rng.js';
export { Player } from './player.js';
export { Placement, validateInput } from './input.js';
export type { Input, InkSpaces, ValidInput } from './input.js';
export { GameState, DEFAULT_TURNS, resolveOverlap } from './game.js';
export type { CreateGameOptions } from './game.js';
export { RawInputSchema, ChoiceSchema, parseMessage } from './schema.js';
export type { ParseResult } from './schema.js';
