import { HttpException, HttpStatus } from '@nestjs/common';

export type AppErrorPayload = {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
};

/**
 * Root of the grader's error taxonomy.
 * Heuristics never throw; only input, export and lookup-data failures end up here.
 */
export class BaseAppError extends HttpException {
  constructor(
    message: string,
    public readonly statusCode: HttpStatus = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly errorCode?: string,
  ) {
    super(message, statusCode);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): AppErrorPayload {
    return {
      statusCode: this.statusCode,
      message: this.message,
      error: this.errorCode || this.name,
      timestamp: new Date().toISOString(),
    };
  }
}
