import { describe, it, expect, vi } from 'vitest';
import { GameState, InvariantError, type PlayerNum } from '@inkgrid/game-logic';
import { Match } from '../src/Match.js';
import { FirstPickRng, RecordingSender, fakeLogger } from './fakes.js';

const PASS = '{"handSlot":0,"action":{"type":"pass"}}';
// Dot Dash (deck index 0) at the top-left corner lands next to player2's starting special
const P2_OPENING = '{"handSlot":0,"action":{"type":"place","x":0,"y":0,"special":false,"rotation":0}}';

function setup(turns = 12) {
  const logger = fakeLogger();
  const p1 = new RecordingSender();
  const p2 = new RecordingSender();
  const factory = vi.fn(() => GameState.create({ rng: new FirstPickRng(), turns }));
  const match = new Match(['alice-id', 'bob-id'], factory, logger);
  const send = (num: PlayerNum, text: string): void => {
    if (num === 'player1') {
      match.handleMessage('player1', text, p1, p2);
    } else {
      match.handleMessage('player2', text, p2, p1);
    }
  };
  return { match, p1, p2, logger, factory, send };
}

function toBattle(ctx: ReturnType<typeof setup>): void {
  ctx.send('player1', 'false');
  ctx.send('player2', 'false');
}

function snapshot(match: Match): string {
  const game = match.gameState;
  return JSON.stringify({
    protocol: match.protocolState,
    board: game.board,
    player1: game.player('player1'),
    player2: game.player('player2'),
    turnsLeft: game.turnsLeft,
  });
}

describe('Match', () => {
  it('should start in the redraw phase with a fresh game', () => {
    const { match, factory } = setup();
    expect(match.protocolState).toEqual({ phase: 'redraw', answers: [undefined, undefined] });
    expect(match.gameState.turnsLeft).toBe(12);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(match.isOver()).toBe(false);
  });

  it('should send each side its own opening state', () => {
    const { match, p1, p2 } = setup();
    match.start(p1, p2);
    const first = p1.last();
    const second = p2.last();
    expect(first?.type).toBe('GAME_STATE');
    expect(second?.type).toBe('GAME_STATE');
    if (first?.type !== 'GAME_STATE' || second?.type !== 'GAME_STATE') return;
    expect(first.player.playerNum).toBe('player1');
    expect(second.player.playerNum).toBe('player2');
    expect(first.board).toHaveLength(26);
    expect(first.board[22][4]).toEqual({ type: 'special', owner: 'player1', activated: false });
  });

  it('should map ids to players', () => {
    const { match } = setup();
    expect(match.playerNum('alice-id')).toBe('player1');
    expect(match.opponentId('alice-id')).toBe('bob-id');
    expect(match.opponentId('bob-id')).toBe('alice-id');
    expect(() => match.opponentId('mallory-id')).toThrow(InvariantError);
  });

  describe('redraw phase', () => {
    it('should wait for both answers', () => {
      const { match, p1, p2, send } = setup();
      send('player1', 'true');
      expect(match.protocolState).toEqual({ phase: 'redraw', answers: [true, undefined] });
      expect(p1.sent).toHaveLength(0);
      expect(p2.sent).toHaveLength(0);
    });

    it('should keep the latest answer from the same player', () => {
      const { match, send } = setup();
      send('player1', 'true');
      send('player1', 'false');
      expect(match.protocolState).toEqual({ phase: 'redraw', answers: [false, undefined] });
    });

    it('should redraw only for players who asked and report to both', () => {
      const { match, p1, p2, send } = setup();
      const redraw = vi.spyOn(match.gameState, 'redrawHand');
      send('player1', 'true');
      send('player2', 'false');

      expect(redraw).toHaveBeenCalledTimes(1);
      expect(redraw).toHaveBeenCalledWith('player1');
      expect(match.protocolState).toEqual({ phase: 'inGame', inputs: [undefined, undefined] });

      const mine = p1.last();
      const theirs = p2.last();
      expect(mine?.type).toBe('REDRAW');
      if (mine?.type === 'REDRAW') expect(mine.player.playerNum).toBe('player1');
      if (theirs?.type === 'REDRAW') expect(theirs.player.playerNum).toBe('player2');
      expect(theirs?.type).toBe('REDRAW');
    });

    it('should drop answers that are not booleans', () => {
      const { match, logger, send } = setup();
      send('player1', 'maybe');
      send('player1', '{"redraw":true}');
      expect(match.protocolState).toEqual({ phase: 'redraw', answers: [undefined, undefined] });
      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith('Failed to parse redraw choice', expect.objectContaining({ player: 'player1' }));
    });
  });

  describe('battle phase', () => {
    it('should resolve a turn once both inputs arrive', () => {
      const ctx = setup();
      toBattle(ctx);
      ctx.send('player1', PASS);
      expect(ctx.match.protocolState.phase).toBe('inGame');
      expect(ctx.p2.sent).toHaveLength(1);

      ctx.send('player2', PASS);
      expect(ctx.match.gameState.turnsLeft).toBe(11);
      expect(ctx.match.protocolState).toEqual({ phase: 'inGame', inputs: [undefined, undefined] });

      const state = ctx.p2.last();
      expect(state?.type).toBe('GAME_STATE');
      if (state?.type === 'GAME_STATE') {
        expect(state.player.playerNum).toBe('player2');
        expect(state.player.special).toBe(1);
      }
    });

    it('should apply placements to the board it reports', () => {
      const ctx = setup();
      toBattle(ctx);
      ctx.send('player2', P2_OPENING);
      ctx.send('player1', PASS);

      const state = ctx.p1.last();
      expect(state?.type).toBe('GAME_STATE');
      if (state?.type !== 'GAME_STATE') return;
      expect(state.board[3][3]).toEqual({ type: 'special', owner: 'player2', activated: false });
      expect(state.board[4][3]).toEqual({ type: 'ink', owner: 'player2' });
      expect(state.board[4][4]).toEqual({ type: 'ink', owner: 'player2' });
      expect(state.player.special).toBe(1);
    });

    it('should drop malformed and illegal moves', () => {
      const ctx = setup();
      toBattle(ctx);
      ctx.send('player1', '{"handSlot":9,"action":{"type":"pass"}}');
      // Nowhere near player1's ink
      ctx.send('player1', P2_OPENING);
      expect(ctx.match.protocolState).toEqual({ phase: 'inGame', inputs: [undefined, undefined] });
      expect(ctx.logger.warn).toHaveBeenCalledWith('Failed to parse game input', expect.objectContaining({ player: 'player1' }));
      expect(ctx.logger.warn).toHaveBeenCalledWith('Invalid game input', expect.objectContaining({ code: 'INK_NOT_ADJACENT' }));
    });

    it('should log messages that fail to deliver', () => {
      const ctx = setup();
      ctx.p2.failuresLeft = 1;
      toBattle(ctx);
      expect(ctx.logger.warn).toHaveBeenCalledWith(
        'Failed to deliver message',
        expect.objectContaining({ player: 'player2', type: 'REDRAW' }),
      );
    });
  });

  describe('end of game', () => {
    it('should report a draw to both sides', () => {
      const ctx = setup(1);
      toBattle(ctx);
      ctx.send('player1', PASS);
      ctx.send('player2', PASS);
      expect(ctx.p1.last()).toEqual({ type: 'GAME_END', outcome: 'DRAW' });
      expect(ctx.p2.last()).toEqual({ type: 'GAME_END', outcome: 'DRAW' });
      expect(ctx.match.protocolState).toEqual({ phase: 'rematch', answers: [undefined, undefined] });
    });

    it('should report the winner and loser', () => {
      const ctx = setup(1);
      toBattle(ctx);
      ctx.send('player2', P2_OPENING);
      ctx.send('player1', PASS);
      expect(ctx.p1.last()).toEqual({ type: 'GAME_END', outcome: 'LOSE' });
      expect(ctx.p2.last()).toEqual({ type: 'GAME_END', outcome: 'WIN' });
    });
  });

  describe('rematch phase', () => {
    function finished() {
      const ctx = setup(1);
      toBattle(ctx);
      ctx.send('player1', PASS);
      ctx.send('player2', PASS);
      return ctx;
    }

    it('should start over with a new game when both accept', () => {
      const ctx = finished();
      const oldGame = ctx.match.gameState;
      ctx.send('player2', 'true');
      expect(ctx.match.protocolState).toEqual({ phase: 'rematch', answers: [undefined, true] });
      ctx.send('player1', 'true');

      expect(ctx.factory).toHaveBeenCalledTimes(2);
      expect(ctx.match.gameState).not.toBe(oldGame);
      expect(ctx.match.gameState.turnsLeft).toBe(1);
      expect(ctx.match.protocolState).toEqual({ phase: 'redraw', answers: [undefined, undefined] });
      expect(ctx.p1.last()?.type).toBe('GAME_STATE');
      expect(ctx.p2.last()?.type).toBe('GAME_STATE');
    });

    it('should end as soon as either side declines', () => {
      const ctx = finished();
      const sent = ctx.p2.sent.length;
      ctx.send('player1', 'false');
      expect(ctx.match.isOver()).toBe(true);
      expect(ctx.match.protocolState).toEqual({ phase: 'end' });
      expect(ctx.p2.sent).toHaveLength(sent);
    });

    it('should drop answers that are not booleans', () => {
      const ctx = finished();
      ctx.send('player1', 'rematch');
      expect(ctx.match.protocolState).toEqual({ phase: 'rematch', answers: [undefined, undefined] });
      expect(ctx.logger.warn).toHaveBeenCalledWith('Failed to parse rematch choice', expect.objectContaining({ player: 'player1' }));
    });

    it('should ignore everything once ended', () => {
      const ctx = finished();
      ctx.send('player1', 'false');
      const sent = ctx.p1.sent.length;
      ctx.send('player2', 'true');
      ctx.send('player1', PASS);
      expect(ctx.match.protocolState).toEqual({ phase: 'end' });
      expect(ctx.p1.sent).toHaveLength(sent);
    });
  });

  describe('malformed messages', () => {
    it('should leave every state untouched during redraw', () => {
      const ctx = setup();
      ctx.send('player2', 'true');
      const before = snapshot(ctx.match);
      for (const text of ['{"redraw":', '"yes"', '1']) ctx.send('player1', text);
      expect(snapshot(ctx.match)).toBe(before);
    });

    it('should leave every state untouched while the other move is buffered', () => {
      const ctx = setup();
      toBattle(ctx);
      ctx.send('player1', PASS);
      const before = snapshot(ctx.match);
      for (const text of ['{"handSlot":0,', 'true', '{"handSlot":4,"action":{"type":"pass"}}']) ctx.send('player2', text);
      expect(snapshot(ctx.match)).toBe(before);
      expect(ctx.match.protocolState).toEqual({
        phase: 'inGame',
        inputs: [{ handSlot: 0, input: { type: 'pass' } }, undefined],
      });
    });

    it('should leave every state untouched during rematch', () => {
      const ctx = setup(1);
      toBattle(ctx);
      ctx.send('player1', PASS);
      ctx.send('player2', PASS);
      ctx.send('player1', 'true');
      const before = snapshot(ctx.match);
      for (const text of ['{', '[]', PASS]) ctx.send('player2', text);
      expect(snapshot(ctx.match)).toBe(before);
      expect(ctx.factory).toHaveBeenCalledTimes(1);
    });
  });
});
