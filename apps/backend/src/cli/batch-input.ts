import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { BadRequestError, NotFoundError } from '../common/errors';

export type BatchArguments = {
  inputPath: string;
  format: string;
};

const FORMAT_FLAG = '--format=';

/** `<input.json> [--format=json|jsonl|csv]`; the flag wins over the configured format. */
export const parseBatchArguments = (argv: readonly string[], defaultFormat: string): BatchArguments => {
  const formatArg = argv.find((arg) => arg.startsWith(FORMAT_FLAG));
  const inputPath = argv.find((arg) => !arg.startsWith('--'));
  if (!inputPath) {
    throw new BadRequestError('Usage: grade <input.json> [--format=json|jsonl|csv]', 'MISSING_INPUT');
  }

  return {
    inputPath: resolve(inputPath),
    format: formatArg ? formatArg.slice(FORMAT_FLAG.length) : defaultFormat,
  };
};

export const readBatchInput = (inputPath: string): unknown => {
  if (!existsSync(inputPath)) {
    throw new NotFoundError(`input file ${inputPath}`);
  }

  const raw = readFileSync(inputPath, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    const msg = err instanceof Error ? err.message : 'Unknown error';
    throw new BadRequestError(`Input file is not valid JSON: ${msg}`, 'INVALID_INPUT');
  }
};
