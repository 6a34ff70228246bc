import { InvalidInputException } from '../common/invalid-input.exception';
import { GoodsService, GoodsServiceAssessment, SemanticMarkAssessment } from '../types/trademark.types';
import { SemanticAssessor } from './semantic-assessor';
import { CaseAssessmentsDto } from './trademark.dto';

const termKey = (applicantTerm: string, opponentTerm: string) =>
  `${applicantTerm.trim().toLowerCase()}\u0000${opponentTerm.trim().toLowerCase()}`;

// Answers from judgments recorded in the case file instead of asking a live assessor.
export class CaseFileSemanticAssessor implements SemanticAssessor {
  private readonly goodsServices = new Map<string, GoodsServiceAssessment>();

  constructor(private readonly assessments: CaseAssessmentsDto) {
    for (const entry of assessments.goodsServices) {
      this.goodsServices.set(termKey(entry.applicantTerm, entry.opponentTerm), {
        similarityScore: entry.similarityScore,
        competitive: entry.competitive,
        complementary: entry.complementary,
      });
    }
  }

  async assessMarks(): Promise<SemanticMarkAssessment> {
    const { conceptual, overall, reasoning } = this.assessments.marks;
    return { conceptual, overall, reasoning };
  }

  async assessGoodsServices(applicantGood: GoodsService, opponentGood: GoodsService): Promise<GoodsServiceAssessment> {
    const assessment = this.goodsServices.get(termKey(applicantGood.term, opponentGood.term));
    if (assessment === undefined) {
      throw new InvalidInputException(
        `no assessment recorded for "${applicantGood.term}" against "${opponentGood.term}"`,
        'assessments.goodsServices',
      );
    }
    return assessment;
  }
}
