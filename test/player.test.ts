import { describe, expect, it, vi } from 'vitest';
import { IllegalPlay } from '../src/game.js';
import { PlayerBoard } from '../src/player.js';
import { move, moves, square, squares } from './helpers.js';

const whiteAfterE4 = (): PlayerBoard => {
  const board = PlayerBoard.create('white').unwrap();
  board.submitOurMove(move('e2e4')).unwrap();
  return board;
};

describe('PlayerBoard', () => {
  it('plays our move directly on our turn', () => {
    const board = PlayerBoard.create('white').unwrap();
    expect(board.submitOurMove(move('e2e4')).unwrap()).toEqual({ kind: 'played', moveId: 0 });
    expect(board.turn).toBe('black');
    expect(board.preMove).toBeUndefined();
  });

  it('queues a pre-move while the opponent is to move', () => {
    const board = whiteAfterE4();
    const submitted = board.submitOurMove(move('g1f3')).unwrap();
    expect(submitted).toEqual({ kind: 'queued', preMove: { from: square('g1'), to: square('f3'), kind: 'normal' } });
    expect(board.preMove?.to).toBe(square('f3'));
    expect(board.moveId()).toBe(1);
  });

  it('applies a queued pre-move that is still legal', () => {
    const board = whiteAfterE4();
    board.submitOurMove(move('g1f3')).unwrap();
    expect(board.submitTheirMove(move('e7e5')).unwrap()).toBe('applied');
    expect(board.preMove).toBeUndefined();
    expect(board.turn).toBe('black');
    expect(board.moveId()).toBe(3);
    expect(board.position().board.get(square('f3'))).toEqual({ role: 'knight', color: 'white' });
  });

  it('discards a pre-move the reply made illegal', () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const board = PlayerBoard.create('white', { logger }).unwrap();
    board.submitOurMove(move('e2e4')).unwrap();
    board.submitOurMove(move('e4e5')).unwrap();
    expect(board.submitTheirMove(move('e7e5')).unwrap()).toBe('discarded');
    expect(board.preMove).toBeUndefined();
    expect(board.turn).toBe('white');
    expect(board.moveId()).toBe(2);
    expect(logger.debug).toHaveBeenCalledWith('discarded pre-move e4e5');
  });

  it('reports when no pre-move was queued', () => {
    const board = whiteAfterE4();
    expect(board.submitTheirMove(move('e7e5')).unwrap()).toBe('none');
    expect(board.turn).toBe('white');
  });

  it('keeps only the latest pre-move', () => {
    const board = whiteAfterE4();
    board.submitOurMove(move('g1f3')).unwrap();
    board.submitOurMove(move('b1c3')).unwrap();
    expect(board.preMove).toEqual({ from: square('b1'), to: square('c3'), kind: 'normal' });
    expect(board.cancelPreMove()).toBe(true);
    expect(board.preMove).toBeUndefined();
    expect(board.cancelPreMove()).toBe(false);
  });

  it('rejects pre-moves no piece could make', () => {
    const board = whiteAfterE4();
    const result = board.submitOurMove(move('a1h8'));
    expect(result.isErr).toBe(true);
    if (result.isErr) expect(result.error.message).toBe(IllegalPlay.IllegalMove);
    expect(board.submitOurMove(move('e7e5')).isErr).toBe(true);
    expect(board.preMove).toBeUndefined();
  });

  it('rejects their move on our turn and illegal replies', () => {
    const board = PlayerBoard.create('white').unwrap();
    const early = board.submitTheirMove(move('e7e5'));
    expect(early.isErr).toBe(true);
    if (early.isErr) expect(early.error.message).toBe(IllegalPlay.IllegalMove);

    board.submitOurMove(move('e2e4')).unwrap();
    board.submitOurMove(move('d2d4')).unwrap();
    expect(board.submitTheirMove(move('e7e4')).isErr).toBe(true);
    expect(board.preMove?.to).toBe(square('d4'));
  });

  it('computes pre-move destinations through other pieces', () => {
    const board = whiteAfterE4();
    expect(board.preDests(square('a1')).size()).toBe(14);
    expect(board.preDests(square('d2')).equals(squares('c3', 'd3', 'd4', 'e3'))).toBe(true);
    expect(board.preDests(square('e8')).isEmpty()).toBe(true);
    expect(board.moveDests(square('d2')).isEmpty()).toBe(true);
  });

  it('offers castling as a pre-move while the right is held', () => {
    const board = whiteAfterE4();
    expect(board.preDests(square('e1')).has(square('h1'))).toBe(true);
    const queued = board.submitOurMove(move('e1h1')).unwrap();
    expect(queued).toEqual({ kind: 'queued', preMove: { from: square('e1'), to: square('h1'), kind: 'castle' } });
    const view = board.view();
    expect(view.board.get(square('g1'))).toEqual({ role: 'king', color: 'white' });
    expect(view.board.get(square('f1'))).toEqual({ role: 'rook', color: 'white' });
  });

  it('accepts the two-file king step as a castling pre-move', () => {
    const board = whiteAfterE4();
    expect(board.preDests(square('e1')).has(square('g1'))).toBe(true);
    expect(board.preDests(square('e1')).has(square('c1'))).toBe(true);
    const queued = board.submitOurMove(move('e1g1')).unwrap();
    expect(queued).toEqual({ kind: 'queued', preMove: { from: square('e1'), to: square('h1'), kind: 'castle' } });
    board.submitOurMove(move('e1c1')).unwrap();
    expect(board.preMove).toEqual({ from: square('e1'), to: square('a1'), kind: 'castle' });
  });

  it('rejects pre-moves with squares off the board', () => {
    const board = whiteAfterE4();
    expect(board.submitOurMove({ from: 6, to: -10 }).isErr).toBe(true);
    expect(board.submitOurMove({ from: 6.5, to: 21 }).isErr).toBe(true);
    expect(board.preDests(0.5).isEmpty()).toBe(true);
    expect(board.preMove).toBeUndefined();
  });

  it('requires a promotion role for pawn pre-moves to the last rank', () => {
    const board = PlayerBoard.replay('white', moves('a2a4 b7b5 a4b5 a7a6 b5a6 c8b7 a6a7')).unwrap();
    expect(board.turn).toBe('black');
    expect(board.submitOurMove(move('a7a8')).isErr).toBe(true);
    expect(board.submitOurMove(move('e2e3q')).isErr).toBe(true);
    board.submitOurMove(move('a7b8q')).unwrap();
    expect(board.preMove).toEqual({ from: square('a7'), to: square('b8'), promotion: 'queen', kind: 'normal' });
  });

  it('draws the pre-move on the view without passing the turn', () => {
    const board = whiteAfterE4();
    board.submitOurMove(move('e4e5')).unwrap();
    const view = board.view();
    expect(view.turn).toBe('black');
    expect(view.board.get(square('e5'))).toEqual({ role: 'pawn', color: 'white' });
    expect(view.board.get(square('e4'))).toBeUndefined();
    expect(board.position().board.get(square('e4'))).toEqual({ role: 'pawn', color: 'white' });
  });

  it('shows the reviewed position while looking back', () => {
    const board = whiteAfterE4();
    board.submitTheirMove(move('e7e5')).unwrap();
    board.review.back();
    expect(board.view().board.get(square('e5'))).toBeUndefined();
    expect(board.view().turn).toBe('black');
    board.review.toEnd();
    expect(board.view().board.get(square('e5'))).toEqual({ role: 'pawn', color: 'black' });
  });

  it('replays both sides with an empty pre-move queue', () => {
    const board = PlayerBoard.replay('black', moves('e2e4 e7e5 g1f3')).unwrap();
    expect(board.preMove).toBeUndefined();
    expect(board.isOurTurn()).toBe(true);
    expect(board.review.length).toBe(4);
    expect(board.legalMoves().length).toBeGreaterThan(0);
  });
});
