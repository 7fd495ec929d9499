import { defineFunction, json, type FunctionConfig } from "../src/lib/http.js";
import { requireEmployer } from "../src/lib/auth-gate.js";
import { employerDashboard } from "../src/lib/dashboard.js";

/**
 * GET /dashboard/employer
 * The caller's postings with per-posting application counts by status.
 */
export const config: FunctionConfig = {
  path: "/dashboard/employer",
  method: ["GET"],
};

export default defineFunction(config, async (req, { portal }) => {
  const employer = requireEmployer(req, portal);
  return json(employerDashboard(employer, portal.jobs, portal.applications));
});
