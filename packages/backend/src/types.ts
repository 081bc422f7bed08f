import type { BoardSpace, PlayerView, ValidInput } from '@inkgrid/game-logic';

export type SendResult = { ok: true } | { ok: false; error: Error };

/** One side of a match's outbound channel. */
export interface MessageSender {
  send(payload: string): SendResult;
}

export type LogMeta = Record<string, unknown>;

export interface MatchLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type GameOutcome = 'WIN' | 'LOSE' | 'DRAW';

// Server -> Client messages
export type ServerMessage =
  | { type: 'REDRAW'; player: PlayerView }
  | { type: 'GAME_STATE'; board: BoardSpace[][]; player: PlayerView }
  | { type: 'GAME_END'; outcome: GameOutcome };

// One answer per player, indexed player1 then player2
export type Slots<T> = [T | undefined, T | undefined];

export type ProtocolState =
  | { phase: 'redraw'; answers: Slots<boolean> }
  | { phase: 'inGame'; inputs: Slots<ValidInput> }
  | { phase: 'rematch'; answers: Slots<boolean> }
  | { phase: 'end' };

export type ClientStatus = 'idle' | 'waiting' | 'inMatch';

