/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, CATEGORY_STATUS } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { requireCaller, CALLER_HEADER } from "./caller.js";
export type { CallerEnv } from "./caller.js";
export { validateBody } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
