import { defineFunction, json, parse, readJson, type FunctionConfig } from "../src/lib/http.js";
import { idParamSchema, reviewSchema } from "../src/lib/schemas.js";
import { authenticate } from "../src/lib/auth-gate.js";

/**
 * PUT /applications/:id/review  { status }
 * status: submitted | under_review | accepted | rejected. No transition
 * rules; the owning employer may set any of them at any time.
 */
export const config: FunctionConfig = {
  path: "/applications/:id/review",
  method: ["PUT"],
};

export default defineFunction(config, async (req, { params, portal }) => {
  const caller = authenticate(req, portal);
  const id = parse(idParamSchema, params.id);
  const { status } = parse(reviewSchema, await readJson(req));
  const application = portal.applications.review(id, caller.id, status);
  console.log(`[applications] ${caller.email} set application ${id} to ${status}`);
  return json(application);
});
