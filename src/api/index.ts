/**
 * API module exports
 */
export { createPanelRouter } from './routes/index.js';
export { createHealthCheck, APP_VERSION } from './controllers/index.js';
export {
  ApiError,
  errorHandler,
  notFoundHandler,
  asyncHandler,
  sessionMiddleware,
  requireSession,
} from './middleware/index.js';
