import { createHmac, timingSafeEqual } from "crypto";
import { z } from "zod";
import { ROLES, type AccessToken, type Identity, type Role, type TokenClaims } from "./types.js";
import { unauthorized } from "./errors.js";

const HEADER = { alg: "HS256", typ: "JWT" } as const;

const claimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  role: z.enum(ROLES),
  iat: z.number().int(),
  exp: z.number().int(),
});

const headerSchema = z.object({ alg: z.literal("HS256") }).passthrough();

export interface TokenServiceOptions {
  secret: string;
  ttlMinutes: number;
  /** Seconds since epoch. */
  now?: () => number;
}

export interface VerifiedToken {
  sub: string;
  email: string;
  role: Role;
}

function encodeSegment(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
  } catch {
    return null;
  }
}

/**
 * Issues and verifies HS256 JSON Web Tokens. Nothing is stored: a token is
 * valid while its signature checks out and `exp` is in the future.
 */
export class TokenService {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(options: TokenServiceOptions) {
    this.secret = options.secret;
    this.ttlSeconds = options.ttlMinutes * 60;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  issue(identity: Identity): AccessToken {
    const iat = this.now();
    const claims: TokenClaims = {
      sub: identity.id,
      email: identity.email,
      role: identity.role,
      iat,
      exp: iat + this.ttlSeconds,
    };
    const unsigned = `${encodeSegment(HEADER)}.${encodeSegment(claims)}`;
    return {
      access_token: `${unsigned}.${this.sign(unsigned)}`,
      token_type: "bearer",
      expires_in: this.ttlSeconds,
    };
  }

  verify(token: string): VerifiedToken {
    const parts = token.split(".");
    if (parts.length !== 3) throw unauthorized();
    const [header, payload, signature] = parts;

    if (!headerSchema.safeParse(decodeSegment(header)).success) throw unauthorized();

    const expected = Buffer.from(this.sign(`${header}.${payload}`));
    const actual = Buffer.from(signature);
    if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
      throw unauthorized();
    }

    const claims = claimsSchema.safeParse(decodeSegment(payload));
    if (!claims.success) throw unauthorized();
    if (claims.data.exp <= this.now()) throw unauthorized("Token has expired");

    const { sub, email, role } = claims.data;
    return { sub, email, role };
  }

  private sign(unsigned: string): string {
    return createHmac("sha256", this.secret).update(unsigned).digest("base64url");
  }
}
