import { defineFunction, json, parse, readForm, type FunctionConfig } from "../src/lib/http.js";
import { tokenFormSchema } from "../src/lib/schemas.js";

/**
 * POST /auth/token
 * OAuth2 password grant, form-encoded: username, password, scope.
 * The first scope naming a role, if any, is the role to log in as.
 */
export const config: FunctionConfig = {
  path: "/auth/token",
  method: ["POST"],
};

export default defineFunction(config, async (req, { portal }) => {
  const { username, password, scope } = parse(tokenFormSchema, await readForm(req));
  const identity = portal.credentials.authenticate(username, password, scope);
  return json(portal.tokens.issue(identity));
});
