import { HttpStatus } from '@nestjs/common';
import { AppErrorPayload, BaseAppError } from './base-app-error';

export interface ValidationField {
  field: string;
  message: string;
  index?: number;
}

/** Raised when a raw batch record cannot be turned into Content. */
export class ValidationError extends BaseAppError {
  constructor(message: string, public readonly fields?: ValidationField[]) {
    super(message, HttpStatus.BAD_REQUEST, 'VALIDATION_ERROR');
  }

  toJSON(): AppErrorPayload & { fields?: ValidationField[] } {
    const base = super.toJSON();
    return {
      ...base,
      ...(this.fields && { fields: this.fields }),
    };
  }
}
