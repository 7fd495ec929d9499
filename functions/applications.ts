import { defineFunction, json, parse, readJson, type FunctionConfig } from "../src/lib/http.js";
import { applicationCreateSchema } from "../src/lib/schemas.js";
import { requireJobSeeker } from "../src/lib/auth-gate.js";

/**
 * POST /applications/  { job_id, cover_letter? }
 * Job seekers only. 404 for an unknown job, 409 when already applied.
 */
export const config: FunctionConfig = {
  path: "/applications",
  method: ["POST"],
};

export default defineFunction(config, async (req, { portal }) => {
  const seeker = requireJobSeeker(req, portal, "Only job seekers can apply");
  const { job_id, cover_letter } = parse(applicationCreateSchema, await readJson(req));
  const application = portal.applications.apply(seeker, job_id, cover_letter);
  console.log(`[applications] ${seeker.email} applied to job ${job_id}`);
  return json(application, 201);
});
