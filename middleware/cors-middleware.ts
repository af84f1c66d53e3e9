import type { Context, MiddlewareHandler, Next } from "hono";

/**
 * CORS middleware that answers preflight requests itself and echoes the
 * origin back only when it is on the allow list.
 */
export function createCorsMiddleware(allowedOrigins: readonly string[]): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin");

    if (origin && allowedOrigins.includes(origin)) {
      c.header("Access-Control-Allow-Origin", origin);
      c.header("Vary", "Origin");
    } else if (origin) {
      console.log(`CORS: origin not allowed: ${origin}`);
    }

    c.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    c.header("Access-Control-Allow-Headers", "Content-Type, Accept");
    c.header("Access-Control-Max-Age", "86400"); // 24 hours

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204);
    }

    await next();
  };
}
