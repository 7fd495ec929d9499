import { defineFunction, json, parse, readJson, type FunctionConfig } from "../src/lib/http.js";
import { jobCreateSchema, skillsFromQuery } from "../src/lib/schemas.js";
import { requireEmployer } from "../src/lib/auth-gate.js";
import type { JobFilter } from "../src/lib/types.js";

/**
 * /jobs/
 *
 * GET   - List jobs, public. Query params (all optional, AND-combined):
 *           query    - case-insensitive substring of title or description
 *           location - case-insensitive substring of location
 *           skills   - repeatable or comma-separated; job must have every one
 * POST  - Post a job (employer). Body: { title, description, location, skills,
 *         company?, salary_min?, salary_max? }
 */
export const config: FunctionConfig = {
  path: "/jobs",
  method: ["GET", "POST"],
};

export default defineFunction(config, async (req, { portal }) => {
  if (req.method === "POST") {
    const employer = requireEmployer(req, portal, "Only employers can post jobs");
    const fields = parse(jobCreateSchema, await readJson(req));
    const job = portal.jobs.create(employer, fields);
    console.log(`[jobs] ${employer.email} posted job ${job.id} "${job.title}"`);
    return json(job, 201);
  }

  const url = new URL(req.url);
  const filter: JobFilter = {};
  const query = url.searchParams.get("query");
  const location = url.searchParams.get("location");
  const skills = skillsFromQuery(url.searchParams.getAll("skills"));
  if (query) filter.query = query;
  if (location) filter.location = location;
  if (skills.length > 0) filter.skills = skills;

  return json(portal.jobs.list(filter));
});
