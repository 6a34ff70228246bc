import { Injectable } from '@nestjs/common';
import { distance } from 'fastest-levenshtein';

// Applied identically to both sides before any comparison.
export function normalizeWordmark(value: string): string {
  return value.normalize('NFKC').trim().replace(/\s+/g, ' ').toUpperCase();
}

@Injectable()
export class LexicalDistanceService {
  /**
   * Edit-distance similarity of two strings: 1 for identical, 0 when every
   * position of the longer string has to be edited. Two empty strings are identical.
   */
  similarity(a: string, b: string): number {
    const left = normalizeWordmark(a);
    const right = normalizeWordmark(b);
    const longest = Math.max(left.length, right.length);
    if (longest === 0) {
      return 1;
    }
    // integer numerator keeps exact band boundaries such as 1/5 === 0.2
    const score = (longest - distance(left, right)) / longest;
    return Math.min(1, Math.max(0, score));
  }
}
