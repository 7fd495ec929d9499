import { defineFunction, json, parse, readJson, type FunctionConfig } from "../src/lib/http.js";
import { employerRegistrationSchema, jobSeekerRegistrationSchema, roleSchema } from "../src/lib/schemas.js";
import { toUserSummary } from "../src/lib/dashboard.js";
import { notFound } from "../src/lib/errors.js";
import type { CredentialStore } from "../src/lib/credentials.js";
import type { Identity, Role } from "../src/lib/types.js";

/**
 * POST /auth/register/jobseeker  { email, password, name, resume? }
 * POST /auth/register/employer   { email, password, name, company_name }
 *
 * 201 with the new user's summary, 409 when the email is taken under any role.
 */
export const config: FunctionConfig = {
  path: "/auth/register/:role",
  method: ["POST"],
};

function register(credentials: CredentialStore, role: Role, body: unknown): Identity {
  switch (role) {
    case "jobseeker": {
      const { email, password, name, resume } = parse(jobSeekerRegistrationSchema, body);
      return credentials.register(email, password, { role, name, resume });
    }
    case "employer": {
      const { email, password, name, company_name } = parse(employerRegistrationSchema, body);
      return credentials.register(email, password, { role, name, company_name });
    }
  }
}

export default defineFunction(config, async (req, { params, portal }) => {
  const role = roleSchema.safeParse(params.role);
  if (!role.success) throw notFound("Registration route");

  const identity = register(portal.credentials, role.data, await readJson(req));
  console.log(`[auth] registered ${identity.role} ${identity.email}`);
  return json(toUserSummary(identity), 201);
});
