import { describe, expect, it } from 'vitest';
import { roundTo } from './round.js';

describe('roundTo', () => {
  it('sends exact halves to the even neighbour', () => {
    expect(roundTo(3.125, 2)).toBe(3.12);
    expect(roundTo(0.03125, 4)).toBe(0.0312);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(3.5, 0)).toBe(4);
    expect(roundTo(-0.125, 2)).toBe(-0.12);
  });

  it('rounds everything else to the nearest value', () => {
    expect(roundTo(66.66666, 2)).toBe(66.67);
    expect(roundTo(-1.23456, 4)).toBe(-1.2346);
    expect(roundTo(-0.00001, 2)).toBe(0);
  });
});
