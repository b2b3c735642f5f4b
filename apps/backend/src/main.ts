import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { BatchGradingService } from './batch/batch-grading.service';
import { parseBatchArguments, readBatchInput } from './cli/batch-input';
import { BaseAppError, ValidationError } from './common/errors';
import { LoggerService } from './common/logger';
import { ResultExporterService } from './export/result-exporter.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  app.useLogger(await app.resolve(LoggerService));
  const logger = new Logger('GradeBatch');

  try {
    const configService = app.get(ConfigService);
    const { inputPath, format } = parseBatchArguments(
      process.argv.slice(2),
      configService.get<string>('EXPORT_FORMAT') || 'json',
    );

    const entries = await app.get(BatchGradingService).gradeBatch(readBatchInput(inputPath));
    const output = app.get(ResultExporterService).export(entries, format);
    process.stdout.write(`${output}\n`);
    logger.log(`Exported ${entries.length} entries from ${inputPath} as ${format}`);
  } catch (err) {
    if (err instanceof ValidationError && err.fields) {
      logger.error(`${err.message}: ${JSON.stringify(err.fields)}`);
    } else if (err instanceof BaseAppError) {
      logger.error(`${err.errorCode || err.name}: ${err.message}`);
    } else {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`Batch grading failed: ${msg}`, err instanceof Error ? err.stack : undefined);
    }
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Failed to start batch grading: ${msg}\n`);
  process.exit(1);
});
