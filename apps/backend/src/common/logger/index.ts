export { LoggerService, LogLevel } from './logger.service';
export type { LogContext } from './logger.service';
export { LoggerModule } from './logger.module';
