import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

export class LookupTableError extends BaseAppError {
  constructor(message: string) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, 'LOOKUP_TABLE_INVALID');
  }
}
