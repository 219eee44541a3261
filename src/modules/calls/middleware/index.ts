export { errorHandler, notFoundHandler, sendError, HttpErrorCode } from './error.middleware';
export type { HttpErrorBody } from './error.middleware';
