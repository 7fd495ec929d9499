import type { z } from "zod";
import type { PortalContext } from "./context.js";
import { PortalError } from "./errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface FunctionConfig {
  /** Express-style path; `:name` segments arrive in `ctx.params`. */
  path: string;
  method: HttpMethod[];
}

export interface RouteContext {
  params: Record<string, string>;
  portal: PortalContext;
}

export type PortalFunction = (req: Request, ctx: RouteContext) => Promise<Response>;

export interface PortalModule {
  default: PortalFunction;
  config: FunctionConfig;
}

export function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data, null, 2), {
    status,
    headers: { ...headers, "Content-Type": "application/json" },
  });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

export function errorResponse(err: PortalError): Response {
  const headers: Record<string, string> = {};
  if (err.kind === "unauthorized") headers["WWW-Authenticate"] = "Bearer";
  return json({ error: err.toDetail() }, err.status, headers);
}

function corsHeaders(origin: string, methods: HttpMethod[]): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Headers": "Content-Type, Authorization",
    "Access-Control-Allow-Methods": [...methods, "OPTIONS"].join(", "),
  };
}

/**
 * Wraps a handler with the behaviour every endpoint shares: CORS,
 * preflight, method check, and mapping thrown errors to responses.
 */
export function defineFunction(config: FunctionConfig, handler: PortalFunction): PortalFunction {
  return async (req, ctx) => {
    const cors = corsHeaders(ctx.portal.config.corsOrigin, config.method);

    if (req.method === "OPTIONS") {
      return new Response(null, { status: 204, headers: cors });
    }

    let res: Response;
    try {
      if (config.method.some((m) => m === req.method)) {
        res = await handler(req, ctx);
      } else {
        res = errorResponse(new PortalError("method_not_allowed", `Method ${req.method} not allowed`));
        res.headers.set("Allow", config.method.join(", "));
      }
    } catch (err) {
      if (err instanceof PortalError) {
        res = errorResponse(err);
      } else {
        console.error(`[${config.path}] unexpected error:`, err);
        res = json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } }, 500);
      }
    }

    for (const [key, value] of Object.entries(cors)) res.headers.set(key, value);
    return res;
  };
}

/* ── Request parsing ── */

export function parse<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      field: issue.path.join(".") || "body",
      message: issue.message,
    }));
    throw new PortalError("validation", "Request validation failed", details);
  }
  return result.data;
}

export async function readJson(req: Request): Promise<unknown> {
  const text = await req.text();
  if (!text.trim()) throw new PortalError("bad_request", "Request body is required");
  try {
    return JSON.parse(text);
  } catch {
    throw new PortalError("bad_request", "Request body must be valid JSON");
  }
}

export async function readForm(req: Request): Promise<Record<string, string>> {
  const params = new URLSearchParams(await req.text());
  return Object.fromEntries(params.entries());
}
