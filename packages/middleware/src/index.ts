export {
  createExpressApiErrorHandler,
  createExpressSessionMiddleware,
  toSessionRequest,
  toSessionResponse,
} from "./express.js";
export type {
  ExpressApiErrorHandlerOptions,
  ExpressNextFunction,
  ExpressRequestLike,
  ExpressResponseLike,
  ExpressSessionMiddleware,
} from "./express.js";
