import { defineFunction, json, parse, readJson, type FunctionConfig } from "../src/lib/http.js";
import { loginSchema } from "../src/lib/schemas.js";

/**
 * POST /auth/login  { email, password, role? }
 * Returns a bearer token. When `role` is given it must match the account.
 */
export const config: FunctionConfig = {
  path: "/auth/login",
  method: ["POST"],
};

export default defineFunction(config, async (req, { portal }) => {
  const { email, password, role } = parse(loginSchema, await readJson(req));
  const identity = portal.credentials.authenticate(email, password, role);
  return json(portal.tokens.issue(identity));
});
