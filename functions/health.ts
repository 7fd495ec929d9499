import { defineFunction, json, type FunctionConfig } from "../src/lib/http.js";

/**
 * GET /
 * Liveness check.
 */
export const config: FunctionConfig = {
  path: "/",
  method: ["GET"],
};

export default defineFunction(config, async () => json({ message: "Healthy" }));
