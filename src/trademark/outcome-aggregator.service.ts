import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InvalidInputException } from '../common/invalid-input.exception';
import assessmentConfig from '../config/assessment.config';
import { categoryRank, parseCategory } from '../similarity/similarity-category';
import {
  CaseOutcome,
  ConfusionDetermination,
  MarkSimilarityResult,
  OppositionOutcome,
  OUTCOME_LABELS,
  OutcomeSummary,
  SIMILARITY_CATEGORIES,
} from '../types/trademark.types';

@Injectable()
export class OutcomeAggregatorService {
  private readonly logger = new Logger(OutcomeAggregatorService.name);

  constructor(
    @Inject(assessmentConfig.KEY)
    private readonly config: ConfigType<typeof assessmentConfig>,
  ) {}

  /**
   * Case-level outcome from every goods/services determination of the case.
   * Confusion on no pair fails, on every pair succeeds, anything between is partial.
   */
  aggregate(markSimilarity: MarkSimilarityResult, determinations: readonly ConfusionDetermination[]): CaseOutcome {
    if (determinations.length === 0) {
      throw new InvalidInputException('an opposition needs at least one goods/services pair', 'goodsServices');
    }

    const summary = this.summarize(markSimilarity, determinations);
    const outcome = this.outcomeFor(summary);
    const confidence = this.round(this.confidenceFor(outcome, summary));

    this.logger.log(
      `Aggregated ${summary.totalPairs} pairs (${summary.confusionPairs} with confusion): ${outcome} at ${confidence}`,
    );

    return {
      outcome,
      label: OUTCOME_LABELS[outcome],
      confidence,
      rationale: this.describe(outcome, summary),
      summary,
    };
  }

  summarize(markSimilarity: MarkSimilarityResult, determinations: readonly ConfusionDetermination[]): OutcomeSummary {
    let directConfusions = 0;
    let indirectConfusions = 0;
    for (const determination of determinations) {
      if (determination.confusionType === 'direct') {
        directConfusions++;
      } else if (determination.confusionType === 'indirect') {
        indirectConfusions++;
      }
    }

    return {
      totalPairs: determinations.length,
      confusionPairs: determinations.filter((d) => d.likelihoodOfConfusion).length,
      directConfusions,
      indirectConfusions,
      markOverall: parseCategory(markSimilarity.overall, 'markSimilarity.overall'),
    };
  }

  private outcomeFor(summary: OutcomeSummary): OppositionOutcome {
    if (summary.confusionPairs === 0) {
      return 'fail';
    }
    if (summary.confusionPairs === summary.totalPairs) {
      return 'succeed';
    }
    return 'partial';
  }

  private confidenceFor(outcome: OppositionOutcome, summary: OutcomeSummary): number {
    switch (outcome) {
      case 'fail': {
        // residual risk grows as the marks approach identity
        const closeness = categoryRank(summary.markOverall) / (SIMILARITY_CATEGORIES.length - 1);
        return 1 - this.config.failConfidencePenalty * closeness;
      }
      case 'succeed':
        return this.config.succeedConfidence[summary.markOverall];
      case 'partial': {
        // lowest at an even split, approaching the upper bound as the split gets lopsided
        const { min, max } = this.config.partialConfidence;
        const skew = Math.abs((2 * summary.confusionPairs) / summary.totalPairs - 1);
        return min + (max - min) * skew;
      }
    }
  }

  private describe(outcome: OppositionOutcome, summary: OutcomeSummary): string {
    return (
      `${OUTCOME_LABELS[outcome]}: ${summary.confusionPairs} of ${summary.totalPairs} goods/services pairs ` +
      `show a likelihood of confusion (${summary.directConfusions} direct, ${summary.indirectConfusions} indirect); ` +
      `overall mark similarity is ${summary.markOverall}.`
    );
  }

  private round(value: number): number {
    const factor = 10 ** this.config.confidencePrecision;
    return Math.round(value * factor) / factor;
  }
}
