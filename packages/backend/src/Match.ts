import {
  ChoiceSchema,
  GameState,
  InputError,
  InvariantError,
  RawInputSchema,
  otherPlayer,
  parseMessage,
  validateInput,
  type PlayerNum,
  type ValidInput,
} from '@inkgrid/game-logic';
import { silentLogger } from './logger.js';
import type {
  GameOutcome,
  MatchLogger,
  MessageSender,
  ProtocolState,
  ServerMessage,
  Slots,
} from './types.js';

export type GameStateFactory = () => GameState;

function slotIndex(num: PlayerNum): 0 | 1 {
  return num === 'player1' ? 0 : 1;
}

function withAnswer<T>(slots: Slots<T>, num: PlayerNum, value: T): Slots<T> {
  return num === 'player1' ? [value, slots[1]] : [slots[0], value];
}

function outcomeFor(num: PlayerNum, winner: PlayerNum | 'draw'): GameOutcome {
  if (winner === 'draw') return 'DRAW';
  return winner === num ? 'WIN' : 'LOSE';
}

/**
 * Protocol for one match between two players:
 * redraw -> in-game turns -> rematch -> (redraw again | end).
 *
 * Each phase waits for an answer from both sides before it resolves. An
 * answer sent twice replaces the earlier one. Messages that don't parse or
 * that break a game rule are logged and dropped without changing state.
 */
export class Match {
  private state: ProtocolState = { phase: 'redraw', answers: [undefined, undefined] };
  private game: GameState;

  constructor(
    readonly playerIds: readonly [string, string],
    private readonly createGameState: GameStateFactory,
    private readonly logger: MatchLogger = silentLogger,
  ) {
    this.game = createGameState();
  }

  get protocolState(): ProtocolState {
    return this.state;
  }

  get gameState(): GameState {
    return this.game;
  }

  isOver(): boolean {
    return this.state.phase === 'end';
  }

  playerNum(id: string): PlayerNum {
    if (id === this.playerIds[0]) return 'player1';
    if (id === this.playerIds[1]) return 'player2';
    throw new InvariantError(`Client ${id} is not part of this match`);
  }

  opponentId(id: string): string {
    return this.playerIds[slotIndex(otherPlayer(this.playerNum(id)))];
  }

  /** Sends each side its opening board and hand. */
  start(player1: MessageSender, player2: MessageSender): void {
    this.sendGameState('player1', player1, player2);
  }

  /**
   * `own` reaches the player who sent `text`, `opponent` the other one.
   * InvariantError propagates; everything else a client can cause is dropped.
   */
  handleMessage(num: PlayerNum, text: string, own: MessageSender, opponent: MessageSender): void {
    const state = this.state;
    switch (state.phase) {
      case 'redraw': {
        const choice = parseMessage(ChoiceSchema, text);
        if (!choice.success) {
          this.logger.warn('Failed to parse redraw choice', { player: num, error: choice.error });
          return;
        }
        this.state = this.processRedraw(withAnswer(state.answers, num, choice.data), num, own, opponent);
        return;
      }
      case 'inGame': {
        const raw = parseMessage(RawInputSchema, text);
        if (!raw.success) {
          this.logger.warn('Failed to parse game input', { player: num, error: raw.error });
          return;
        }
        let input: ValidInput;
        try {
          input = validateInput(raw.data, this.game.board, this.game.player(num));
        } catch (err) {
          if (err instanceof InputError) {
            this.logger.warn('Invalid game input', { player: num, code: err.code, error: err.message });
            return;
          }
          throw err;
        }
        this.state = this.processInput(withAnswer(state.inputs, num, input), num, own, opponent);
        return;
      }
      case 'rematch': {
        const choice = parseMessage(ChoiceSchema, text);
        if (!choice.success) {
          this.logger.warn('Failed to parse rematch choice', { player: num, error: choice.error });
          return;
        }
        this.state = this.processRematch(withAnswer(state.answers, num, choice.data), num, own, opponent);
        return;
      }
      case 'end':
        this.logger.debug('Ignoring message for finished match', { player: num });
        return;
    }
  }

  private processRedraw(
    answers: Slots<boolean>,
    num: PlayerNum,
    own: MessageSender,
    opponent: MessageSender,
  ): ProtocolState {
    const [p1, p2] = answers;
    if (p1 === undefined || p2 === undefined) {
      return { phase: 'redraw', answers };
    }
    if (p1) this.game.redrawHand('player1');
    if (p2) this.game.redrawHand('player2');
    this.sendBoth(num, own, opponent, player => ({
      type: 'REDRAW',
      player: this.game.player(player).toJSON(),
    }));
    return { phase: 'inGame', inputs: [undefined, undefined] };
  }

  private processInput(
    inputs: Slots<ValidInput>,
    num: PlayerNum,
    own: MessageSender,
    opponent: MessageSender,
  ): ProtocolState {
    const [input1, input2] = inputs;
    if (input1 === undefined || input2 === undefined) {
      return { phase: 'inGame', inputs };
    }
    this.game.update(input1, input2);

    if (this.game.turnsLeft === 0) {
      const winner = this.game.checkWinner();
      this.logger.info('Match finished', {
        winner,
        player1: this.game.board.countInkedSpaces('player1'),
        player2: this.game.board.countInkedSpaces('player2'),
      });
      this.sendBoth(num, own, opponent, player => ({ type: 'GAME_END', outcome: outcomeFor(player, winner) }));
      return { phase: 'rematch', answers: [undefined, undefined] };
    }

    this.sendGameState(num, own, opponent);
    return { phase: 'inGame', inputs: [undefined, undefined] };
  }

  private processRematch(
    answers: Slots<boolean>,
    num: PlayerNum,
    own: MessageSender,
    opponent: MessageSender,
  ): ProtocolState {
    const [p1, p2] = answers;
    // The transport removes the match once it has ended
    if (p1 === false || p2 === false) {
      return { phase: 'end' };
    }
    if (p1 === undefined || p2 === undefined) {
      return { phase: 'rematch', answers };
    }
    this.game = this.createGameState();
    this.sendGameState(num, own, opponent);
    return { phase: 'redraw', answers: [undefined, undefined] };
  }

  private sendGameState(num: PlayerNum, own: MessageSender, opponent: MessageSender): void {
    this.sendBoth(num, own, opponent, player => ({
      type: 'GAME_STATE',
      board: this.game.board.toJSON(),
      player: this.game.player(player).toJSON(),
    }));
  }

  private sendBoth(
    num: PlayerNum,
    own: MessageSender,
    opponent: MessageSender,
    build: (player: PlayerNum) => ServerMessage,
  ): void {
    this.send(own, num, build(num));
    const other = otherPlayer(num);
    this.send(opponent, other, build(other));
  }

  private send(sender: MessageSender, player: PlayerNum, message: ServerMessage): void {
    const result = sender.send(JSON.stringify(message));
    if (!result.ok) {
      this.logger.warn('Failed to deliver message', { player, type: message.type, error: result.error.message });
    }
  }
}
