import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";
import type { AppBindings } from "../types/context.js";

/**
 * Request ID middleware
 * Reuses an upstream request ID when present, otherwise generates one.
 * The ID is echoed on the response for log correlation.
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  const existingRequestId =
    c.req.header("x-request-id") || c.req.header("x-correlation-id");

  const requestId = existingRequestId || randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  await next();
}
