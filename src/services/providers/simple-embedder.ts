// src/services/providers/simple-embedder.ts
// Deterministic hashed bag-of-words embedding; needs no API key. Used offline and in tests.

import { tokenize, type Embedder, type Embedding } from '@/services/providers/retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  private dim: number;

  constructor(dim = 64) {
    this.dim = dim;
  }

  async embed(text: string): Promise<Embedding> {
    const vec: number[] = new Array<number>(this.dim).fill(0);

    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dim] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}
