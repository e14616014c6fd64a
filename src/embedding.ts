/**
 * Lexical embedding for the Chroma collection.
 *
 * Word counts are hashed into a fixed number of dimensions (with a sign
 * bit to spread collisions) and L2-normalized, all in-process.
 */

import { createHash } from "crypto";
import type { IEmbeddingFunction } from "chromadb";

export const EMBEDDING_DIMENSIONS = 256;

function hashToken(token: string): { index: number; sign: number } {
  const digest = createHash("md5").update(token).digest();
  return {
    index: digest.readUInt32BE(0),
    sign: (digest[4] ?? 0) & 1 ? -1 : 1,
  };
}

export function embedText(text: string, dimensions: number = EMBEDDING_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

  for (const token of tokens) {
    const { index, sign } = hashToken(token);
    const slot = index % dimensions;
    vector[slot] = (vector[slot] ?? 0) + sign;
  }

  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

export class HashedLexicalEmbedding implements IEmbeddingFunction {
  constructor(private dimensions: number = EMBEDDING_DIMENSIONS) {}

  async generate(texts: string[]): Promise<number[][]> {
    return texts.map((text) => embedText(text, this.dimensions));
  }
}
