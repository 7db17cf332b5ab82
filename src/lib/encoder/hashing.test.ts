import { describe, expect, it } from 'vitest';
import { createHashBackend, hashEmbed, parseHashModel, tokenize } from './hashing.js';

describe('tokenize', () => {
  it('lowercases, splits on punctuation and drops stop words and single characters', () => {
    expect(tokenize('The Surface-Code decoder, for 2 qubits!')).toEqual(['surface', 'code', 'decoder', 'qubits']);
  });
});

describe('parseHashModel', () => {
  it('accepts hash:<dim> within bounds', () => {
    expect(parseHashModel('hash:256')).toBe(256);
    expect(parseHashModel('hash:16')).toBe(16);
  });

  it('rejects other ids and out-of-range dimensions', () => {
    expect(parseHashModel('allenai/specter2_base')).toBeNull();
    expect(parseHashModel('hash:8')).toBeNull();
    expect(parseHashModel('hash:16.5')).toBeNull();
    expect(parseHashModel('hash:abc')).toBeNull();
  });
});

describe('hashEmbed', () => {
  it('is deterministic and unit length', () => {
    const a = hashEmbed('lattice surgery between surface code patches', 128);
    const b = hashEmbed('lattice surgery between surface code patches', 128);
    expect(a).toEqual(b);
    expect(a).toHaveLength(128);
    const norm = Math.sqrt(a.reduce((s, v) => s + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('ignores word order', () => {
    expect(hashEmbed('decoder surface code', 64)).toEqual(hashEmbed('code decoder surface', 64));
  });

  it('returns a zero vector when nothing survives tokenization', () => {
    expect(hashEmbed('the of and', 32)).toEqual(new Array<number>(32).fill(0));
  });
});

describe('createHashBackend', () => {
  it('embeds with the dimension named in the model id', async () => {
    const backend = createHashBackend('hash:64');
    expect(backend.model).toBe('hash:64');
    expect(await backend.embed('magic state distillation')).toHaveLength(64);
  });

  it('rejects a malformed id', () => {
    expect(() => createHashBackend('hash:8')).toThrow('Invalid term-hash model id "hash:8" (expected hash:<16-65536>)');
  });
});
