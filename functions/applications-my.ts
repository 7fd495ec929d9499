import { defineFunction, json, type FunctionConfig } from "../src/lib/http.js";
import { requireJobSeeker } from "../src/lib/auth-gate.js";

/**
 * GET /applications/my
 * The calling job seeker's applications, oldest first.
 */
export const config: FunctionConfig = {
  path: "/applications/my",
  method: ["GET"],
};

export default defineFunction(config, async (req, { portal }) => {
  const seeker = requireJobSeeker(req, portal, "Only job seekers can view their applications");
  return json(portal.applications.listByApplicant(seeker.id));
});
