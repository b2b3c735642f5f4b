import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

export class UnsupportedExportFormatError extends BaseAppError {
  constructor(public readonly format: string, supported: readonly string[]) {
    super(
      `Unsupported export format "${format}", expected one of: ${supported.join(', ')}`,
      HttpStatus.BAD_REQUEST,
      'UNSUPPORTED_EXPORT_FORMAT',
    );
  }
}
