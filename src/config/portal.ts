/**
 * PORTAL CONFIGURATION
 *
 * Read once at startup. Every value has a development default so the
 * API runs with no environment at all.
 */

export const DEV_JWT_SECRET = "dev-only-secret";

export interface PortalConfig {
  port: number;
  jwtSecret: string;
  tokenTtlMinutes: number;
  corsOrigin: string;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadPortalConfig(env: NodeJS.ProcessEnv = process.env): PortalConfig {
  const jwtSecret = env.JWT_SECRET || DEV_JWT_SECRET;
  if (jwtSecret === DEV_JWT_SECRET) {
    console.warn("[config] JWT_SECRET not set, using development secret");
  }

  return {
    port: positiveInt(env.PORT, 8000),
    jwtSecret,
    tokenTtlMinutes: positiveInt(env.ACCESS_TOKEN_EXPIRE_MINUTES, 60),
    corsOrigin: env.CORS_ORIGIN || "*",
  };
}
