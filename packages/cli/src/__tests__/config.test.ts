import { describe, it, expect } from 'vitest';
import { readEnv, resolveConfig } from '../config.js';

describe('readEnv', () => {
  it('reads board size and seed', () => {
    expect(readEnv({ QUEENS_BOARD_SIZE: '8', QUEENS_SEED: '4' })).toEqual({
      ok: true,
      value: { boardSize: 8, baseSeed: 4 },
    });
  });

  it('ignores blank values', () => {
    expect(readEnv({ QUEENS_BOARD_SIZE: '  ' })).toEqual({ ok: true, value: {} });
  });

  it('rejects values outside the accepted range', () => {
    const seed = readEnv({ QUEENS_SEED: '-4' });
    expect(seed.ok).toBe(false);
    if (!seed.ok) {
      expect(seed.error.message).toBe('QUEENS_SEED: Number must be greater than or equal to 0');
      expect(seed.error.field).toBe('baseSeed');
    }

    const size = readEnv({ QUEENS_BOARD_SIZE: '0' });
    expect(size.ok).toBe(false);
    if (!size.ok) {
      expect(size.error.message).toBe('QUEENS_BOARD_SIZE: Number must be greater than or equal to 1');
    }
  });

  it('rejects non-integers', () => {
    const result = readEnv({ QUEENS_SEED: 'soon' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('QUEENS_SEED must be an integer, got "soon"');
      expect(result.error.field).toBe('baseSeed');
    }
  });
});

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig({}, 10)).toEqual({
      ok: true,
      value: {
        boardSize: 12,
        trials: 10,
        showBoard: false,
        listOperations: true,
        quiet: false,
      },
    });
  });

  it('lets flags override the environment', () => {
    const result = resolveConfig(
      { boardSize: 6 },
      3,
      { QUEENS_BOARD_SIZE: '8', QUEENS_SEED: '11' }
    );
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.boardSize).toBe(6);
      expect(result.value.baseSeed).toBe(11);
    }
  });

  it('names the rejected field', () => {
    const result = resolveConfig({ boardSize: 0 }, 3);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('boardSize');
      expect(result.error.message).toBe('boardSize: Number must be greater than or equal to 1');
    }
  });

  it('rejects a seed beyond 32 bits', () => {
    const result = resolveConfig({ baseSeed: 1e20 }, 3);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('baseSeed');
      expect(result.error.message).toBe('baseSeed: Number must be less than or equal to 4294967295');
    }
    expect(resolveConfig({ baseSeed: 0xffffffff }, 3).ok).toBe(true);
  });

  it('rejects a non-numeric flag value', () => {
    const result = resolveConfig({ baseSeed: Number.NaN }, 3);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('baseSeed');
    }
  });

  it('reports environment errors before validating flags', () => {
    const result = resolveConfig({ boardSize: 0 }, 3, { QUEENS_BOARD_SIZE: 'x' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('QUEENS_BOARD_SIZE must be an integer, got "x"');
    }
  });
});
