import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { firstValueFrom, from } from 'rxjs';
import { mergeMap, toArray } from 'rxjs/operators';
import { InvalidInputException } from '../common/invalid-input.exception';
import assessmentConfig from '../config/assessment.config';
import { MarkSimilarityService } from '../similarity/mark-similarity.service';
import {
  CasePrediction,
  ConfusionDetermination,
  GoodsService,
  MarkSimilarityResult,
  PredictionRequest,
  Wordmark,
} from '../types/trademark.types';
import { ConfusionClassifierService } from './confusion-classifier.service';
import { OutcomeAggregatorService } from './outcome-aggregator.service';
import { SEMANTIC_ASSESSOR, SemanticAssessor } from './semantic-assessor';

@Injectable()
export class TrademarkService {
  private readonly logger = new Logger(TrademarkService.name);

  constructor(
    @Inject(SEMANTIC_ASSESSOR) private readonly semanticAssessor: SemanticAssessor,
    @Inject(assessmentConfig.KEY) private readonly config: ConfigType<typeof assessmentConfig>,
    private readonly markSimilarity: MarkSimilarityService,
    private readonly confusionClassifier: ConfusionClassifierService,
    private readonly outcomeAggregator: OutcomeAggregatorService,
  ) {}

  async compareMarks(applicant: Wordmark, opponent: Wordmark): Promise<MarkSimilarityResult> {
    const form = this.markSimilarity.assessForm(applicant.wordmark, opponent.wordmark);
    const semantic = await this.semanticAssessor.assessMarks(applicant, opponent, form);
    return this.markSimilarity.resolve(form, semantic);
  }

  async assessGoodsService(
    applicantGood: GoodsService,
    opponentGood: GoodsService,
    markSimilarity: MarkSimilarityResult,
  ): Promise<ConfusionDetermination> {
    const assessment = await this.semanticAssessor.assessGoodsServices(applicantGood, opponentGood, markSimilarity);
    return this.confusionClassifier.classify(
      {
        applicantGood,
        opponentGood,
        similarityScore: assessment.similarityScore,
        competitive: assessment.competitive,
        complementary: assessment.complementary,
      },
      markSimilarity.overall,
    );
  }

  // Every applicant term against every opponent term, in that order.
  async assessGoodsServicesBatch(
    applicantGoods: readonly GoodsService[],
    opponentGoods: readonly GoodsService[],
    markSimilarity: MarkSimilarityResult,
  ): Promise<ConfusionDetermination[]> {
    if (applicantGoods.length === 0) {
      throw new InvalidInputException('at least one goods/services term is required', 'applicantGoods');
    }
    if (opponentGoods.length === 0) {
      throw new InvalidInputException('at least one goods/services term is required', 'opponentGoods');
    }

    const pairs = applicantGoods.flatMap((applicantGood) =>
      opponentGoods.map((opponentGood) => ({ applicantGood, opponentGood })),
    );
    this.logger.log(
      `Assessing ${pairs.length} goods/services pairs (concurrency ${this.config.goodsServicesConcurrency})`,
    );

    const assessed = await firstValueFrom(
      from(pairs.map((pair, index) => ({ ...pair, index }))).pipe(
        mergeMap(
          async ({ applicantGood, opponentGood, index }) => ({
            index,
            determination: await this.assessGoodsService(applicantGood, opponentGood, markSimilarity),
          }),
          this.config.goodsServicesConcurrency,
        ),
        toArray(),
      ),
    );

    return assessed.sort((a, b) => a.index - b.index).map(({ determination }) => determination);
  }

  // Runs only once every determination of the case is available.
  predictCase(markSimilarity: MarkSimilarityResult, determinations: ConfusionDetermination[]): CasePrediction {
    const outcome = this.outcomeAggregator.aggregate(markSimilarity, determinations);
    return { markComparison: markSimilarity, goodsServices: determinations, outcome };
  }

  async predict(request: PredictionRequest): Promise<CasePrediction> {
    const { applicant, opponent } = request;
    this.logger.log(`Predicting opposition by '${opponent.wordmark}' against '${applicant.wordmark}'`);
    try {
      const markComparison = await this.compareMarks(applicant, opponent);
      const determinations = await this.assessGoodsServicesBatch(
        request.applicantGoods,
        request.opponentGoods,
        markComparison,
      );
      const prediction = { applicant, opponent, ...this.predictCase(markComparison, determinations) };

      this.logger.log(
        `${prediction.outcome.label} for '${applicant.wordmark}' (confidence ${prediction.outcome.confidence})`,
      );
      return prediction;
    } catch (error) {
      this.handleError(error, `Error predicting opposition against '${applicant.wordmark}'`);
      throw error;
    }
  }

  private handleError(error: unknown, message: string) {
    if (error instanceof InvalidInputException) {
      this.logger.warn(`Invalid input: ${error.message}`);
    } else if (error instanceof Error) {
      this.logger.error(`Unexpected error: ${error.message}`);
      this.logger.error(`${message}: ${error.stack}`);
    } else {
      this.logger.error(`${message}: ${String(error)}`);
    }
  }
}
