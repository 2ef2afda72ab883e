import { describe, expect, it } from 'vitest';
import { SquareSet } from '../src/squareSet.js';
import { squares } from './helpers.js';

describe('SquareSet', () => {
  it('adds and removes squares in both halves', () => {
    const set = SquareSet.empty().with(0).with(63).with(31).with(32);
    expect(set.size()).toBe(4);
    expect([...set]).toEqual([0, 31, 32, 63]);
    expect([...set.reversed()]).toEqual([63, 32, 31, 0]);
    expect(set.without(31).has(31)).toBe(false);
    expect(set.toggle(5).has(5)).toBe(true);
  });

  it('finds the first and last square', () => {
    const set = squares('c2', 'f7');
    expect(set.first()).toBe(10);
    expect(set.last()).toBe(53);
    expect(SquareSet.empty().first()).toBeUndefined();
    expect(set.withoutFirst().equals(squares('f7'))).toBe(true);
  });

  it('knows when it holds a single square', () => {
    expect(squares('e4').singleSquare()).toBe(28);
    expect(squares('e4', 'e5').singleSquare()).toBeUndefined();
    expect(squares('a1', 'h8').moreThanOne()).toBe(true);
    expect(SquareSet.empty().moreThanOne()).toBe(false);
  });

  it('combines sets', () => {
    const a = squares('a1', 'b2', 'c3');
    const b = squares('c3', 'd4');
    expect(a.union(b).equals(squares('a1', 'b2', 'c3', 'd4'))).toBe(true);
    expect(a.intersect(b).equals(squares('c3'))).toBe(true);
    expect(a.diff(b).equals(squares('a1', 'b2'))).toBe(true);
    expect(a.xor(b).equals(squares('a1', 'b2', 'd4'))).toBe(true);
    expect(a.intersects(b)).toBe(true);
    expect(a.isDisjoint(squares('h8'))).toBe(true);
    expect(a.supersetOf(squares('b2'))).toBe(true);
    expect(squares('b2').subsetOf(a)).toBe(true);
  });

  it('builds ranks, files and back ranks', () => {
    expect(SquareSet.fromRank(0).equals(SquareSet.backrank('white'))).toBe(true);
    expect(SquareSet.fromRank(7).equals(SquareSet.backrank('black'))).toBe(true);
    expect(SquareSet.fromFile(4).size()).toBe(8);
    expect(SquareSet.fromFile(4).has(60)).toBe(true);
    expect(SquareSet.full().complement().isEmpty()).toBe(true);
    expect(SquareSet.corners().equals(squares('a1', 'h1', 'a8', 'h8'))).toBe(true);
  });

  it('splits light and dark squares', () => {
    expect(SquareSet.darkSquares().has(0)).toBe(true);
    expect(SquareSet.lightSquares().has(1)).toBe(true);
    expect(SquareSet.lightSquares().has(63)).toBe(false);
    expect(SquareSet.lightSquares().union(SquareSet.darkSquares()).equals(SquareSet.full())).toBe(true);
    expect(SquareSet.lightSquares().size()).toBe(32);
  });

  it('shifts across the halves', () => {
    expect(squares('a1').shl64(40).equals(squares('a6'))).toBe(true);
    expect(squares('h8').shr64(63).equals(squares('a1'))).toBe(true);
    expect(squares('h4').shl64(1).equals(squares('a5'))).toBe(true);
    expect(squares('a1').shl64(64).isEmpty()).toBe(true);
  });

  it('swaps and reverses bytes', () => {
    expect(squares('a1').bswap64().equals(squares('a8'))).toBe(true);
    expect(squares('a1').rbit64().equals(squares('h8'))).toBe(true);
  });

  it('subtracts with a borrow', () => {
    expect(squares('a5').minus64(squares('a1')).equals(new SquareSet(-1, 0))).toBe(true);
  });

  it('writes a stable hex key', () => {
    expect(squares('a1').toHex()).toBe('0000000000000001');
    expect(squares('h8').toHex()).toBe('8000000000000000');
  });
});
