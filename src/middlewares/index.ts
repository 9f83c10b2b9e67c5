export { errorHandler, notFoundHandler } from './error-handler.js';
export { requestLogger } from './request-logger.js';
