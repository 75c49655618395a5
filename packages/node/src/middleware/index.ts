/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody } from "./validate.js";
