import { describe, expect, it } from "vitest";
import { TokenService } from "./tokens.js";
import { PortalError } from "./errors.js";
import type { Identity } from "./types.js";

const seeker: Identity = {
  id: "seeker-1",
  email: "sam@seeker.test",
  name: "Sam",
  role: "jobseeker",
  resume: null,
  created_at: "2026-01-01T00:00:00.000Z",
};

function verifyError(service: TokenService, token: string): PortalError {
  try {
    service.verify(token);
  } catch (err) {
    if (err instanceof PortalError) return err;
    throw err;
  }
  throw new Error("token unexpectedly verified");
}

describe("TokenService", () => {
  it("issues a bearer token that verifies to the identity's id and role", () => {
    const service = new TokenService({ secret: "test-secret", ttlMinutes: 30, now: () => 1_000 });
    const token = service.issue(seeker);

    expect(token.token_type).toBe("bearer");
    expect(token.expires_in).toBe(1800);
    expect(token.access_token.split(".")).toHaveLength(3);
    expect(service.verify(token.access_token)).toEqual({ sub: "seeker-1", email: "sam@seeker.test", role: "jobseeker" });
  });

  it("rejects a token once it has expired", () => {
    let now = 1_000;
    const service = new TokenService({ secret: "test-secret", ttlMinutes: 1, now: () => now });
    const { access_token } = service.issue(seeker);

    now = 1_059;
    expect(service.verify(access_token).sub).toBe("seeker-1");

    now = 1_060;
    const err = verifyError(service, access_token);
    expect(err.kind).toBe("unauthorized");
    expect(err.message).toBe("Token has expired");
  });

  it("rejects a token signed with another secret", () => {
    const issuer = new TokenService({ secret: "other-secret", ttlMinutes: 30 });
    const verifier = new TokenService({ secret: "test-secret", ttlMinutes: 30 });

    expect(verifyError(verifier, issuer.issue(seeker).access_token).kind).toBe("unauthorized");
  });

  it("rejects a token whose payload was altered", () => {
    const service = new TokenService({ secret: "test-secret", ttlMinutes: 30 });
    const [header, , signature] = service.issue(seeker).access_token.split(".");
    const forged = Buffer.from(JSON.stringify({ sub: "seeker-1", email: "x", role: "employer", iat: 0, exp: 9_999_999_999 })).toString("base64url");

    expect(verifyError(service, `${header}.${forged}.${signature}`).kind).toBe("unauthorized");
  });

  it("rejects malformed tokens", () => {
    const service = new TokenService({ secret: "test-secret", ttlMinutes: 30 });

    expect(verifyError(service, "not-a-token").kind).toBe("unauthorized");
    expect(verifyError(service, "a.b.c").kind).toBe("unauthorized");
  });
});
