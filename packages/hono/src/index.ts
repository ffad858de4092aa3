export {
  createHonoCookieSink,
  createHonoHttpContext,
  honoCookieSink,
  SIDSTORE_HONO_SESSION_KEY,
  toHonoMiddleware,
  type SidstoreHonoAdapterOptions,
} from "./HonoAdapter";
