#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import * as dotenv from 'dotenv';
import { readFile } from 'fs/promises';
import { AppModule } from './app.module';
import { parseCaseFile, toPredictionRequest } from './trademark/case-file';
import { CaseFileSemanticAssessor } from './trademark/case-file-semantic-assessor';
import { TrademarkService } from './trademark/trademark.service';

dotenv.config();

const logger = new Logger('Bootstrap');

// stdout carries the prediction; only errors are logged unless asked for more
const LOG_LEVELS: LogLevel[] =
  process.env.LOG_LEVEL === 'debug' ? ['error', 'warn', 'log', 'debug'] : ['error'];

async function bootstrap() {
  const casePath = process.argv[2];
  if (!casePath) {
    throw new Error('Usage: opposition-engine <case.json>');
  }

  const caseFile = await parseCaseFile(JSON.parse(await readFile(casePath, 'utf8')));
  const app = await NestFactory.createApplicationContext(
    AppModule.register({ semanticAssessor: new CaseFileSemanticAssessor(caseFile.assessments) }),
    { logger: LOG_LEVELS },
  );

  try {
    const prediction = await app.get(TrademarkService).predict(toPredictionRequest(caseFile));
    process.stdout.write(`${JSON.stringify(prediction, null, 2)}\n`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
