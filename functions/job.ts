import { defineFunction, json, noContent, parse, readJson, type FunctionConfig } from "../src/lib/http.js";
import { idParamSchema, jobUpdateSchema } from "../src/lib/schemas.js";
import { requireEmployer } from "../src/lib/auth-gate.js";

/**
 * /jobs/:id
 *
 * GET     - Fetch one job, public
 * PUT     - Partial update, owning employer only
 * DELETE  - Remove, owning employer only. Applications to it are kept.
 */
export const config: FunctionConfig = {
  path: "/jobs/:id",
  method: ["GET", "PUT", "DELETE"],
};

export default defineFunction(config, async (req, { params, portal }) => {
  if (req.method === "GET") {
    return json(portal.jobs.get(parse(idParamSchema, params.id)));
  }

  // Writes answer 401/403 before anything about the id
  const employer = requireEmployer(req, portal);
  const id = parse(idParamSchema, params.id);

  if (req.method === "PUT") {
    const fields = parse(jobUpdateSchema, await readJson(req));
    return json(portal.jobs.update(id, employer.id, fields));
  }

  portal.jobs.delete(id, employer.id);
  console.log(`[jobs] ${employer.email} deleted job ${id}`);
  return noContent();
});
