import { describe, it, expect } from 'vitest';
import { vec4 } from 'gl-matrix';
import { generatePosition, colorizeFragment, TRIANGLE_COLOR } from './stages';

describe('generatePosition', () => {
  it('maps index 0 to the bottom-right vertex', () => {
    expect(Array.from(generatePosition(0))).toEqual([Math.fround(0.4), -0.5, 0, 1]);
  });

  it('maps index 1 to the apex', () => {
    expect(Array.from(generatePosition(1))).toEqual([0, 0.5, 0, 1]);
  });

  it('maps index 2 to the bottom-left vertex', () => {
    expect(Array.from(generatePosition(2))).toEqual([Math.fround(-0.4), -0.5, 0, 1]);
  });

  it('returns bit-identical output for repeated calls', () => {
    for (const index of [0, 1, 2]) {
      const first = generatePosition(index);
      const second = generatePosition(index);
      expect(second).not.toBe(first);
      expect(vec4.exactEquals(first, second)).toBe(true);
    }
  });

  it('produces three distinct positions', () => {
    const keys = new Set([0, 1, 2].map((i) => Array.from(generatePosition(i)).join(',')));
    expect(keys.size).toBe(3);
  });
});

describe('colorizeFragment', () => {
  it('returns opaque dark brown', () => {
    const color = colorizeFragment({ position: vec4.fromValues(10.5, 20.5, 0, 1) });
    expect(Array.from(color)).toEqual([Math.fround(0.3), Math.fround(0.2), Math.fround(0.1), 1]);
  });

  it('ignores the fragment position', () => {
    const a = colorizeFragment({ position: vec4.fromValues(0.5, 0.5, 0, 1) });
    const b = colorizeFragment({ position: vec4.fromValues(99.5, 42.5, 0.25, 1) });
    expect(vec4.exactEquals(a, b)).toBe(true);
  });

  it('hands out a copy of the constant color', () => {
    const color = colorizeFragment({ position: vec4.create() });
    color[0] = 1;
    expect(TRIANGLE_COLOR[0]).toBe(Math.fround(0.3));
  });
});
