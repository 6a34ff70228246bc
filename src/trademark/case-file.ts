import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { InvalidInputException } from '../common/invalid-input.exception';
import { PredictionRequest, Wordmark } from '../types/trademark.types';
import { CaseFileDto, WordmarkDto } from './trademark.dto';

function describeErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((constraint) => `${path}: ${constraint}`);
    return [...own, ...describeErrors(error.children ?? [], path)];
  });
}

export async function parseCaseFile(payload: unknown): Promise<CaseFileDto> {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new InvalidInputException('a case file must be a JSON object', 'case');
  }

  const caseFile = plainToInstance(CaseFileDto, payload);
  const errors = await validate(caseFile);
  if (errors.length > 0) {
    throw new InvalidInputException(describeErrors(errors).join('; '), 'case');
  }
  return caseFile;
}

function toWordmark(dto: WordmarkDto): Wordmark {
  return {
    wordmark: dto.wordmark,
    isRegistered: dto.isRegistered ?? false,
    registrationNumber: dto.registrationNumber,
  };
}

export function toPredictionRequest(caseFile: CaseFileDto): PredictionRequest {
  return {
    applicant: toWordmark(caseFile.applicant),
    opponent: toWordmark(caseFile.opponent),
    applicantGoods: caseFile.applicantGoods.map(({ term, niceClass }) => ({ term, niceClass })),
    opponentGoods: caseFile.opponentGoods.map(({ term, niceClass }) => ({ term, niceClass })),
  };
}
