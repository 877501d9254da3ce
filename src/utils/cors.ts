/**
 * CORS allow-list for the browser front end.
 */

const LOCAL_DEV_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173', 'http://localhost:3000'];

/** Ports forwarded from a Codespace (front end dev server and Strapi) */
const CODESPACE_PORTS = [5173, 3000, 1337];

const DEFAULT_CODESPACES_DOMAIN = 'app.github.dev';

export interface CorsEnv {
  readonly CORS_ORIGINS?: string;
  readonly WEB_APP_URL?: string;
  readonly CODESPACE_NAME?: string;
  readonly GITHUB_CODESPACES_PORT_FORWARDING_DOMAIN?: string;
}

function normalizeOrigin(value: string): string | undefined {
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  try {
    return new URL(trimmed).origin;
  } catch {
    return undefined;
  }
}

/**
 * Origins allowed to call the API, de-duplicated, in order:
 * CORS_ORIGINS (comma separated), WEB_APP_URL, then the Codespaces
 * forwarded origins when CODESPACE_NAME is set, else the local dev origins.
 * Malformed entries are dropped.
 */
export function resolveAllowedOrigins(env: CorsEnv = process.env): string[] {
  const candidates: string[] = [];

  if (env.CORS_ORIGINS) {
    candidates.push(...env.CORS_ORIGINS.split(','));
  }
  if (env.WEB_APP_URL) {
    candidates.push(env.WEB_APP_URL);
  }

  if (env.CODESPACE_NAME) {
    const domain = env.GITHUB_CODESPACES_PORT_FORWARDING_DOMAIN || DEFAULT_CODESPACES_DOMAIN;
    for (const port of CODESPACE_PORTS) {
      candidates.push(`https://${env.CODESPACE_NAME}-${port}.${domain}`);
    }
  } else {
    candidates.push(...LOCAL_DEV_ORIGINS);
  }

  const origins: string[] = [];
  for (const candidate of candidates) {
    const origin = normalizeOrigin(candidate);
    if (origin && !origins.includes(origin)) {
      origins.push(origin);
    }
  }
  return origins;
}
