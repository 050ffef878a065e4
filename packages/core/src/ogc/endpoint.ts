import { InvalidEndpointError } from '../errors.js';

export const DEFAULT_MAX_URL_LENGTH = 400;

/**
 * Build a request URL from a service base URL and query overrides.
 *
 * Query keys are folded to lowercase so `Version=1.1.0` in the base URL and an
 * override `version` collapse into one parameter, with the override winning.
 * Keys are written in ascending order, so the result does not depend on how
 * either input was ordered.
 */
export function buildEndpointUrl(
  baseUrl: string,
  overrides: Record<string, string>,
  maxUrlLength = DEFAULT_MAX_URL_LENGTH
): string {
  if (!baseUrl || baseUrl.length > maxUrlLength) {
    throw new InvalidEndpointError(
      baseUrl ? `Service URL exceeds ${maxUrlLength} characters` : 'Service URL is empty',
      baseUrl
    );
  }

  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch {
    throw new InvalidEndpointError('Service URL is not a valid URL', baseUrl);
  }

  if (url.protocol !== 'https:') {
    throw new InvalidEndpointError('Only https:// service URLs are allowed', baseUrl);
  }

  const query = new Map<string, string>();
  for (const [key, value] of url.searchParams) {
    query.set(key.toLowerCase(), value);
  }
  for (const [key, value] of Object.entries(overrides)) {
    query.set(key.toLowerCase(), value);
  }

  const params = new URLSearchParams();
  for (const key of [...query.keys()].sort()) {
    params.append(key, query.get(key) ?? '');
  }

  url.search = params.toString();
  return url.toString();
}

export function capabilitiesOverrides(kind: string, version: string): Record<string, string> {
  return {
    service: kind,
    request: 'GetCapabilities',
    ...(version ? { version } : {})
  };
}
