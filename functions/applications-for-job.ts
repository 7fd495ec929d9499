import { defineFunction, json, parse, type FunctionConfig } from "../src/lib/http.js";
import { idParamSchema } from "../src/lib/schemas.js";
import { authenticate } from "../src/lib/auth-gate.js";

/**
 * GET /applications/for-job/:jobId
 * Applications for one job. Only the employer who posted it may look.
 */
export const config: FunctionConfig = {
  path: "/applications/for-job/:jobId",
  method: ["GET"],
};

export default defineFunction(config, async (req, { params, portal }) => {
  const caller = authenticate(req, portal);
  const jobId = parse(idParamSchema, params.jobId);
  return json(portal.applications.listByJob(jobId, caller.id));
});
