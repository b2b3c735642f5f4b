import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

export class NotFoundError extends BaseAppError {
  constructor(resource: string, errorCode?: string) {
    super(`Not found: ${resource}`, HttpStatus.NOT_FOUND, errorCode || 'NOT_FOUND');
  }
}
