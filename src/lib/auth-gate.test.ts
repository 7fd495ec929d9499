import { describe, expect, it } from "vitest";
import { authenticate, bearerToken, requireEmployer, requireJobSeeker } from "./auth-gate.js";
import { PortalError } from "./errors.js";
import { seedEmployer, seedSeeker, testPortal, tokenFor } from "../test/portal.js";

function withAuth(value?: string): Request {
  const headers = new Headers();
  if (value !== undefined) headers.set("Authorization", value);
  return new Request("http://localhost/", { headers });
}

function gateError(fn: () => unknown): PortalError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PortalError) return err;
    throw err;
  }
  throw new Error("gate unexpectedly passed");
}

describe("bearerToken", () => {
  it("extracts the token from a Bearer header", () => {
    expect(bearerToken(withAuth("Bearer abc.def.ghi"))).toBe("abc.def.ghi");
    expect(bearerToken(withAuth("bearer abc"))).toBe("abc");
  });

  it("returns null for missing or other schemes", () => {
    expect(bearerToken(withAuth())).toBeNull();
    expect(bearerToken(withAuth("Basic dXNlcjpwYXNz"))).toBeNull();
  });
});

describe("authorization gate", () => {
  it("resolves the caller's identity from a valid token", () => {
    const portal = testPortal();
    const seeker = seedSeeker(portal);
    expect(authenticate(withAuth(`Bearer ${tokenFor(portal, seeker)}`), portal)).toEqual(seeker);
  });

  it("answers unauthorized without a token or with a bad one", () => {
    const portal = testPortal();
    expect(gateError(() => authenticate(withAuth(), portal)).status).toBe(401);
    expect(gateError(() => authenticate(withAuth("Bearer junk"), portal)).status).toBe(401);
  });

  it("answers unauthorized when the subject is not registered in this process", () => {
    const issuer = testPortal();
    const token = tokenFor(issuer, seedSeeker(issuer));
    expect(gateError(() => authenticate(withAuth(`Bearer ${token}`), testPortal())).kind).toBe("unauthorized");
  });

  it("answers forbidden on a role mismatch", () => {
    const portal = testPortal();
    const employerReq = withAuth(`Bearer ${tokenFor(portal, seedEmployer(portal))}`);
    const seekerReq = withAuth(`Bearer ${tokenFor(portal, seedSeeker(portal))}`);

    expect(requireEmployer(employerReq, portal).role).toBe("employer");
    expect(requireJobSeeker(seekerReq, portal).role).toBe("jobseeker");

    const err = gateError(() => requireJobSeeker(employerReq, portal, "Only job seekers can apply"));
    expect(err.status).toBe(403);
    expect(err.message).toBe("Only job seekers can apply");
    expect(gateError(() => requireEmployer(seekerReq, portal)).message).toBe("Employers only");
  });
});
