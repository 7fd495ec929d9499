import { defineFunction, json, type FunctionConfig } from "../src/lib/http.js";
import { requireJobSeeker } from "../src/lib/auth-gate.js";
import { jobseekerDashboard } from "../src/lib/dashboard.js";

/**
 * GET /dashboard/jobseeker
 * The caller's applications, each joined with a summary of its job.
 */
export const config: FunctionConfig = {
  path: "/dashboard/jobseeker",
  method: ["GET"],
};

export default defineFunction(config, async (req, { portal }) => {
  const seeker = requireJobSeeker(req, portal);
  return json(jobseekerDashboard(seeker, portal.jobs, portal.applications));
});
