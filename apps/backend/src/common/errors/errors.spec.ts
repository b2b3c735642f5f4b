import { HttpStatus } from '@nestjs/common';
import {
  BadRequestError,
  LookupTableError,
  NotFoundError,
  UnsupportedExportFormatError,
  ValidationError,
} from './index';

describe('application errors', () => {
  it('should carry status and error code in the serialised form', () => {
    const error = new UnsupportedExportFormatError('xml', ['json', 'jsonl', 'csv']);

    expect(error.statusCode).toBe(HttpStatus.BAD_REQUEST);
    expect(error.format).toBe('xml');
    expect(error.toJSON()).toMatchObject({
      statusCode: 400,
      message: 'Unsupported export format "xml", expected one of: json, jsonl, csv',
      error: 'UNSUPPORTED_EXPORT_FORMAT',
    });
  });

  it('should include field details for validation errors', () => {
    const error = new ValidationError('Invalid content record', [
      { field: 'contentType', message: 'contentType must be one of the following values', index: 2 },
    ]);

    expect(error.toJSON().fields).toEqual([
      { field: 'contentType', message: 'contentType must be one of the following values', index: 2 },
    ]);
    expect(error.name).toBe('ValidationError');
  });

  it('should fall back to default codes', () => {
    expect(new BadRequestError('missing input').toJSON().error).toBe('BAD_REQUEST');
    expect(new NotFoundError('input.json').message).toBe('Not found: input.json');
    expect(new LookupTableError('broken').errorCode).toBe('LOOKUP_TABLE_INVALID');
  });
});
