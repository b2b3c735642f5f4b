export { BaseAppError } from './base-app-error';
export type { AppErrorPayload } from './base-app-error';
export { BadRequestError } from './bad-request-error';
export { NotFoundError } from './not-found-error';
export { ValidationError } from './validation-error';
export type { ValidationField } from './validation-error';
export { UnsupportedExportFormatError } from './unsupported-export-format-error';
export { LookupTableError } from './lookup-table-error';
