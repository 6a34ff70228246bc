import { Injectable, Logger } from '@nestjs/common';
import { InvalidInputException } from '../common/invalid-input.exception';
import {
  FormSimilarity,
  MarkSimilarityResult,
  SemanticMarkAssessment,
  SimilarityCategory,
} from '../types/trademark.types';
import { LexicalDistanceService } from './lexical-distance.service';
import { PhoneticEncoderService } from './phonetic-encoder.service';
import { compareCategories, parseCategory, scoreToCategory } from './similarity-category';

@Injectable()
export class MarkSimilarityService {
  private readonly logger = new Logger(MarkSimilarityService.name);

  constructor(
    private readonly lexicalDistance: LexicalDistanceService,
    private readonly phoneticEncoder: PhoneticEncoderService,
  ) {}

  // Visual and aural comparison of two wordmarks.
  assessForm(applicant: string, opponent: string): FormSimilarity {
    this.requireWordmark(applicant, 'applicant.wordmark');
    this.requireWordmark(opponent, 'opponent.wordmark');

    const visualScore = this.lexicalDistance.similarity(applicant, opponent);
    const auralScore = this.phoneticEncoder.auralSimilarity(applicant, opponent);
    this.logger.debug(`Form similarity ${applicant} / ${opponent}: visual=${visualScore} aural=${auralScore}`);

    return {
      visualScore,
      auralScore,
      visual: scoreToCategory(visualScore),
      aural: scoreToCategory(auralScore),
    };
  }

  /**
   * Combines the computed form similarity with the externally judged conceptual and
   * overall categories. Identity of form dominates: identical visual and aural
   * categories force an identical overall, and identity in either one forces at
   * least high.
   */
  resolve(form: FormSimilarity, semantic: SemanticMarkAssessment): MarkSimilarityResult {
    const conceptual = parseCategory(semantic.conceptual, 'conceptual');
    const judgedOverall = parseCategory(semantic.overall, 'overall');
    const overall = this.applyFormIdentityFloor(form, judgedOverall);

    if (overall !== judgedOverall) {
      this.logger.log(`Overall similarity raised from ${judgedOverall} to ${overall} by form identity`);
    }

    return {
      visual: form.visual,
      aural: form.aural,
      conceptual,
      overall,
      reasoning: semantic.reasoning,
      scores: { visual: form.visualScore, aural: form.auralScore },
    };
  }

  applyFormIdentityFloor(form: FormSimilarity, overall: SimilarityCategory): SimilarityCategory {
    let floor: SimilarityCategory | undefined;
    if (form.visual === 'identical' && form.aural === 'identical') {
      floor = 'identical';
    } else if (form.visual === 'identical' || form.aural === 'identical') {
      floor = 'high';
    }
    return floor !== undefined && compareCategories(overall, floor) < 0 ? floor : overall;
  }

  private requireWordmark(value: string, field: string): void {
    if (value.trim() === '') {
      this.logger.warn(`Rejected empty wordmark for ${field}`);
      throw new InvalidInputException('wordmark must not be empty', field);
    }
  }
}
