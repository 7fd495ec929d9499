import express, { type NextFunction, type Request as ExpressRequest, type Response as ExpressResponse } from "express";
import type { PortalContext } from "./lib/context.js";
import type { PortalModule } from "./lib/http.js";
import { functions } from "./routes.js";

// Hop-by-hop and length headers are recomputed for the rebuilt request
const SKIPPED_HEADERS = new Set(["content-length", "transfer-encoding", "connection"]);

export function toFetchRequest(req: ExpressRequest): Request {
  const url = `${req.protocol}://${req.get("host") || "localhost"}${req.originalUrl}`;

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined || SKIPPED_HEADERS.has(key)) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }

  const canHaveBody = req.method !== "GET" && req.method !== "HEAD";
  const body = canHaveBody && Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body.toString("utf8") : undefined;
  return new Request(url, { method: req.method, headers, body });
}

export async function sendFetchResponse(res: ExpressResponse, response: Response): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, key) => res.setHeader(key, value));
  res.send(Buffer.from(await response.arrayBuffer()));
}

const CLIENT_ERROR_CODES: Record<number, string> = {
  413: "PAYLOAD_TOO_LARGE",
  415: "UNSUPPORTED_MEDIA_TYPE",
};

/** 4xx status carried by body-parser errors (too large, bad encoding, aborted). */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status =
    "status" in err && typeof err.status === "number"
      ? err.status
      : "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : undefined;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

function mount(app: express.Express, mod: PortalModule, portal: PortalContext): void {
  app.all(mod.config.path, (req, res, next) => {
    mod
      .default(toFetchRequest(req), { params: { ...req.params }, portal })
      .then((response) => sendFetchResponse(res, response))
      .catch(next);
  });
}

/** Express host for the portal functions. */
export function createApp(portal: PortalContext): express.Express {
  const app = express();
  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      console.log(`${req.method} ${req.originalUrl} → ${res.statusCode} (${Date.now() - started}ms)`);
    });
    next();
  });

  app.use(express.raw({ type: "*/*", limit: "1mb" }));

  for (const mod of functions) mount(app, mod, portal);

  app.use((req, res) => {
    res.status(404).json({ error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` } });
  });

  app.use((err: unknown, req: ExpressRequest, res: ExpressResponse, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const message = err instanceof Error ? err.message : "Bad request";
      res.status(status).json({ error: { code: CLIENT_ERROR_CODES[status] ?? "BAD_REQUEST", message } });
      return;
    }
    console.error(`[server] ${req.method} ${req.originalUrl} failed:`, err);
    res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  });

  return app;
}
