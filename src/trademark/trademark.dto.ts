import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { SIMILARITY_CATEGORIES, SimilarityCategory } from '../types/trademark.types';

export class WordmarkDto {
  @IsString()
  @IsNotEmpty()
  wordmark!: string;

  @IsOptional()
  @IsBoolean()
  isRegistered?: boolean;

  @IsOptional()
  @IsString()
  registrationNumber?: string;
}

export class GoodsServiceDto {
  @IsString()
  @IsNotEmpty()
  term!: string;

  @IsInt()
  @Min(1)
  @Max(45)
  niceClass!: number;
}

export class MarkAssessmentDto {
  @IsIn([...SIMILARITY_CATEGORIES])
  conceptual!: SimilarityCategory;

  @IsIn([...SIMILARITY_CATEGORIES])
  overall!: SimilarityCategory;

  @IsOptional()
  @IsString()
  reasoning?: string;
}

export class GoodsServiceAssessmentDto {
  @IsString()
  @IsNotEmpty()
  applicantTerm!: string;

  @IsString()
  @IsNotEmpty()
  opponentTerm!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  similarityScore!: number;

  @IsBoolean()
  competitive!: boolean;

  @IsBoolean()
  complementary!: boolean;
}

export class CaseAssessmentsDto {
  @ValidateNested()
  @Type(() => MarkAssessmentDto)
  marks!: MarkAssessmentDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => GoodsServiceAssessmentDto)
  goodsServices!: GoodsServiceAssessmentDto[];
}

export class CaseFileDto {
  @ValidateNested()
  @Type(() => WordmarkDto)
  applicant!: WordmarkDto;

  @ValidateNested()
  @Type(() => WordmarkDto)
  opponent!: WordmarkDto;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => GoodsServiceDto)
  applicantGoods!: GoodsServiceDto[];

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => GoodsServiceDto)
  opponentGoods!: GoodsServiceDto[];

  @ValidateNested()
  @Type(() => CaseAssessmentsDto)
  assessments!: CaseAssessmentsDto;
}
