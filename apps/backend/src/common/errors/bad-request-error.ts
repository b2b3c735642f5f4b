import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

/** Malformed invocation of the batch entry point, such as a missing input file argument. */
export class BadRequestError extends BaseAppError {
  constructor(message: string, errorCode?: string) {
    super(message, HttpStatus.BAD_REQUEST, errorCode || 'BAD_REQUEST');
  }
}
