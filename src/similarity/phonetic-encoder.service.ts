import { Injectable } from '@nestjs/common';
import doubleMetaphone from 'double-metaphone';
import { PhoneticCode } from '../types/trademark.types';
import { LexicalDistanceService, normalizeWordmark } from './lexical-distance.service';

@Injectable()
export class PhoneticEncoderService {
  constructor(private readonly lexicalDistance: LexicalDistanceService) {}

  encode(mark: string): PhoneticCode {
    const normalized = normalizeWordmark(mark);
    const [primary, secondary] = doubleMetaphone(normalized);

    // Digits, symbols and unpronounced letters yield no code; keep the characters as written.
    if (primary === '') {
      return { primary: normalized.replace(/\s+/g, ''), fallback: true };
    }
    if (secondary === '' || secondary === primary) {
      return { primary, fallback: false };
    }
    return { primary, alternate: secondary, fallback: false };
  }

  /**
   * Best similarity over every primary/alternate reading of the two marks, so a
   * confusable pronunciation in either reading counts.
   */
  auralSimilarity(a: string, b: string): number {
    const left = this.readings(this.encode(a));
    const right = this.readings(this.encode(b));

    let best = 0;
    for (const l of left) {
      for (const r of right) {
        best = Math.max(best, this.lexicalDistance.similarity(l, r));
      }
    }
    return best;
  }

  private readings(code: PhoneticCode): string[] {
    return code.alternate === undefined ? [code.primary] : [code.primary, code.alternate];
  }
}
