export {
  createExpressCookieSink,
  createExpressHttpContext,
  expressCookieSink,
  toExpressMiddleware,
  type SidstoreExpressAdapterOptions,
  type SidstoreExpressHandler,
  type SidstoreExpressNext,
  type SidstoreExpressRequest,
  type SidstoreExpressResponse,
} from "./ExpressAdapter";
