import { ExtractionError } from '../errors';

export type Route = { kind: 'markup'; jobId: string } | { kind: 'visual'; url: string };

const BARE_ID = /^\d+$/;
const VIEW_PATH_ID = /\/jobs\/view\/(?:[^/?#]*-)?(\d+)/;
const QUERY_ID = /[?&]currentJobId=(\d+)/;
const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/** `www.example.com/jobs/1` → `https://www.example.com/jobs/1`; inputs with a scheme pass through. */
export function withScheme(input: string): string {
  const trimmed = input.trim();
  return HAS_SCHEME.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/** Posting ID from a bare number, a `/jobs/view/<id>` path or a `currentJobId` query parameter. */
export function extractJobId(input: string): string | null {
  const trimmed = input.trim();
  if (BARE_ID.test(trimmed)) return trimmed;
  return VIEW_PATH_ID.exec(trimmed)?.[1] ?? QUERY_ID.exec(trimmed)?.[1] ?? null;
}

function parseUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

/** Whether the input belongs to the professional network whose guest job API we know. */
export function isProfessionalNetworkUrl(input: string): boolean {
  const trimmed = input.trim();
  if (BARE_ID.test(trimmed)) return true;
  const url = parseUrl(withScheme(trimmed));
  if (!url) return false;
  const host = url.hostname.toLowerCase();
  const onNetwork = host === 'linkedin.com' || host.endsWith('.linkedin.com');
  return onNetwork && url.pathname.startsWith('/jobs/');
}

export function routeUrl(input: string): Route {
  if (!isProfessionalNetworkUrl(input)) return { kind: 'visual', url: withScheme(input) };
  const jobId = extractJobId(input);
  if (!jobId) {
    throw new ExtractionError('InvalidJobId', `Could not find a job posting ID in: ${input}`);
  }
  return { kind: 'markup', jobId };
}
