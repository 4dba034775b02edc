/**
 * API Middleware exports
 */
export {
  ApiError,
  errorHandler,
  notFoundHandler,
  asyncHandler,
} from './errorHandler.js';

export {
  sessionMiddleware,
  requireSession,
  findSession,
  type SessionMiddlewareOptions,
} from './session.js';
