import type { EmployerIdentity, Identity, JobSeekerIdentity } from "./types.js";
import type { PortalContext } from "./context.js";
import { forbidden, unauthorized } from "./errors.js";

const BEARER = /^Bearer\s+(\S+)\s*$/i;

export function bearerToken(req: Request): string | null {
  const header = req.headers.get("authorization");
  if (!header) return null;
  const match = BEARER.exec(header);
  return match ? match[1] : null;
}

/**
 * Resolves the caller from `Authorization: Bearer <token>`. The token's
 * subject must still be registered under the role the token claims.
 */
export function authenticate(req: Request, portal: PortalContext): Identity {
  const token = bearerToken(req);
  if (!token) throw unauthorized("Not authenticated");

  const claims = portal.tokens.verify(token);
  const identity = portal.credentials.get(claims.sub);
  if (!identity || identity.role !== claims.role) throw unauthorized();
  return identity;
}

export function requireJobSeeker(req: Request, portal: PortalContext, message = "Job seekers only"): JobSeekerIdentity {
  const identity = authenticate(req, portal);
  switch (identity.role) {
    case "jobseeker":
      return identity;
    case "employer":
      throw forbidden(message);
  }
}

export function requireEmployer(req: Request, portal: PortalContext, message = "Employers only"): EmployerIdentity {
  const identity = authenticate(req, portal);
  switch (identity.role) {
    case "employer":
      return identity;
    case "jobseeker":
      throw forbidden(message);
  }
}
