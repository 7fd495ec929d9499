import { randomBytes, randomUUID, scryptSync, timingSafeEqual } from "crypto";
import type { Identity, RegistrationProfile, Role } from "./types.js";
import { conflict, unauthorized } from "./errors.js";

const KEY_LENGTH = 32;

interface StoredIdentity {
  identity: Identity;
  password_hash: string; // "<salt hex>:<scrypt hex>"
}

function hashPassword(password: string): string {
  const salt = randomBytes(16);
  const derived = scryptSync(password, salt, KEY_LENGTH);
  return `${salt.toString("hex")}:${derived.toString("hex")}`;
}

function passwordMatches(password: string, stored: string): boolean {
  const [saltHex, hashHex] = stored.split(":", 2);
  if (!saltHex || !hashHex) return false;
  const expected = Buffer.from(hashHex, "hex");
  const actual = scryptSync(password, Buffer.from(saltHex, "hex"), expected.length);
  return timingSafeEqual(actual, expected);
}

function emailKey(email: string): string {
  return email.trim().toLowerCase();
}

function buildIdentity(email: string, profile: RegistrationProfile): Identity {
  const base = { id: randomUUID(), email: email.trim(), name: profile.name, created_at: new Date().toISOString() };
  switch (profile.role) {
    case "jobseeker":
      return { ...base, role: "jobseeker", resume: profile.resume };
    case "employer":
      return { ...base, role: "employer", company_name: profile.company_name };
  }
}

/**
 * Registered identities keyed by lower-cased email, with a secondary
 * index by id for token subjects.
 */
export class CredentialStore {
  private readonly byEmail = new Map<string, StoredIdentity>();
  private readonly emailById = new Map<string, string>();

  register(email: string, password: string, profile: RegistrationProfile): Identity {
    const key = emailKey(email);
    if (this.byEmail.has(key)) throw conflict("Email already registered");

    const identity = buildIdentity(email, profile);
    this.byEmail.set(key, { identity, password_hash: hashPassword(password) });
    this.emailById.set(identity.id, key);
    return identity;
  }

  /** Unknown email, wrong password and role mismatch all fail the same way. */
  authenticate(email: string, password: string, role?: Role): Identity {
    const stored = this.byEmail.get(emailKey(email));
    if (!stored || !passwordMatches(password, stored.password_hash)) {
      throw unauthorized("Incorrect email, password, or role");
    }
    if (role && stored.identity.role !== role) {
      throw unauthorized("Incorrect email, password, or role");
    }
    return stored.identity;
  }

  get(id: string): Identity | undefined {
    const key = this.emailById.get(id);
    return key ? this.byEmail.get(key)?.identity : undefined;
  }

  get size(): number {
    return this.byEmail.size;
  }
}
