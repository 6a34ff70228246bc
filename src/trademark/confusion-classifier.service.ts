import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { assertUnitInterval, InvalidInputException } from '../common/invalid-input.exception';
import assessmentConfig from '../config/assessment.config';
import { parseCategory } from '../similarity/similarity-category';
import {
  ConfusionDetermination,
  ConfusionType,
  GoodsService,
  GoodsServicePair,
  SimilarityCategory,
} from '../types/trademark.types';

@Injectable()
export class ConfusionClassifierService {
  private readonly logger = new Logger(ConfusionClassifierService.name);

  constructor(
    @Inject(assessmentConfig.KEY)
    private readonly config: ConfigType<typeof assessmentConfig>,
  ) {}

  // Weaker mark similarity demands closer goods/services before confusion is found.
  thresholdFor(markOverall: SimilarityCategory): number {
    return this.config.confusionThresholds[parseCategory(markOverall, 'markSimilarity.overall')];
  }

  classify(pair: GoodsServicePair, markOverall: SimilarityCategory): ConfusionDetermination {
    assertUnitInterval(pair.similarityScore, 'similarityScore');
    this.requireNiceClass(pair.applicantGood, 'applicantGood.niceClass');
    this.requireNiceClass(pair.opponentGood, 'opponentGood.niceClass');

    const threshold = this.thresholdFor(markOverall);
    if (pair.similarityScore < threshold) {
      this.logger.debug(
        `No confusion for "${pair.applicantGood.term}" / "${pair.opponentGood.term}": ${pair.similarityScore} < ${threshold}`,
      );
      return { pair, likelihoodOfConfusion: false, confusionType: null, threshold };
    }

    const confusionType = this.confusionTypeFor(pair);
    this.logger.debug(
      `${confusionType} confusion for "${pair.applicantGood.term}" / "${pair.opponentGood.term}": ${pair.similarityScore} >= ${threshold}`,
    );
    return { pair, likelihoodOfConfusion: true, confusionType, threshold };
  }

  private confusionTypeFor(pair: GoodsServicePair): ConfusionType {
    if (pair.competitive || pair.similarityScore >= this.config.directConfusionScore) {
      return 'direct';
    }
    if (pair.complementary) {
      return 'indirect';
    }
    // threshold cleared without either flag: treated as identical goods
    return 'direct';
  }

  private requireNiceClass(good: GoodsService, field: string): void {
    if (!Number.isInteger(good.niceClass) || good.niceClass < 1 || good.niceClass > 45) {
      throw new InvalidInputException(`expected a Nice class between 1 and 45, received ${good.niceClass}`, field);
    }
  }
}
