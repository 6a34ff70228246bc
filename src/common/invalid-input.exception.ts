import { BadRequestException } from '@nestjs/common';

export class InvalidInputException extends BadRequestException {
  constructor(message: string, readonly field?: string) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'InvalidInputException';
  }
}

export function assertUnitInterval(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidInputException(`expected a score in [0, 1], received ${value}`, field);
  }
}
