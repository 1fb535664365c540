import type { EmbeddingProvider } from '../gateway/types.js';

/**
 * Deterministic local embedder using signed feature hashing over word
 * tokens and CJK character bigrams. No network; suitable for offline runs
 * and tests, not for semantic quality.
 */
export class HashingEmbedder implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly dimensions: number;

  constructor(dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions < 8) {
      throw new RangeError(`HashingEmbedder needs at least 8 dimensions, got ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const feature of tokenize(text)) {
      const h = fnv1a(feature);
      const index = h % this.dimensions;
      const sign = (h >>> 31) === 0 ? 1 : -1;
      vector[index] += sign;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

const CJK = /[㐀-鿿豈-﫿]/u;

export function tokenize(text: string): string[] {
  const features: string[] = [];
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  for (const word of words) {
    if (CJK.test(word)) {
      const chars = Array.from(word);
      if (chars.length === 1) features.push(chars[0]);
      for (let i = 0; i + 1 < chars.length; i++) {
        features.push(chars[i] + chars[i + 1]);
      }
    } else {
      features.push(word);
    }
  }
  return features;
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
