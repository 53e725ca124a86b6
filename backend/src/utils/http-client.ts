import { InvalidInputError, UpstreamError, describeError } from './errors';

export const OPENWEATHER_DOMAIN = 'openweathermap.org';
export const NWS_DOMAIN = 'api.weather.gov';
export const DEFAULT_ALLOWED_HOSTS: readonly string[] = Object.freeze([OPENWEATHER_DOMAIN, NWS_DOMAIN]);

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export interface FetchOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, options?: FetchOptions) => Promise<HttpResponse>;

export const buildClientHeaders = (userAgent: string): Record<string, string> => ({
  'User-Agent': userAgent,
  Accept: 'application/geo+json, application/json',
});

export const createFetchWithTimeout = (
  defaultTimeoutMs: number,
  fetchImpl: FetchLike = (url, options) => globalThis.fetch(url, options),
) => async (url: string, options: FetchOptions = {}, timeoutMs: number = defaultTimeoutMs): Promise<HttpResponse> => {
  const controller = new AbortController();
  const upstreamSignal = options.signal;
  const abortFromUpstream = () => {
    controller.abort(upstreamSignal?.reason);
  };
  if (upstreamSignal) {
    if (upstreamSignal.aborted) {
      abortFromUpstream();
    } else {
      upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
    }
  }
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchImpl(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
    if (upstreamSignal) {
      upstreamSignal.removeEventListener('abort', abortFromUpstream);
    }
  }
};

const hostMatchesDomain = (host: string, domain: string): boolean => {
  const normalizedDomain = domain.toLowerCase();
  return host === normalizedDomain || host.endsWith(`.${normalizedDomain}`);
};

/**
 * Rejects anything that is not HTTPS or whose host is outside the allow-list.
 * A host matches when it equals an allowed domain or is one of its subdomains.
 */
export const assertAllowedUrl = (rawUrl: string, allowedHosts: readonly string[] = DEFAULT_ALLOWED_HOSTS): URL => {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch (error) {
    throw new InvalidInputError(`invalid URL: ${rawUrl}`, { cause: error });
  }

  if (parsed.protocol !== 'https:') {
    throw new InvalidInputError('URL must use HTTPS');
  }

  const host = parsed.hostname.toLowerCase();
  if (!allowedHosts.some((domain) => hostMatchesDomain(host, domain))) {
    throw new InvalidInputError(`URL host not allowed: ${parsed.host}`);
  }

  return parsed;
};

export interface JsonClient {
  getJson(url: string, label: string): Promise<unknown>;
}

interface CreateJsonClientOptions {
  fetchImpl: FetchLike;
  headers?: Record<string, string>;
  allowedHosts?: readonly string[];
}

export const createJsonClient = ({ fetchImpl, headers = {}, allowedHosts = DEFAULT_ALLOWED_HOSTS }: CreateJsonClientOptions): JsonClient => ({
  async getJson(url: string, label: string): Promise<unknown> {
    assertAllowedUrl(url, allowedHosts);

    let response: HttpResponse;
    try {
      response = await fetchImpl(url, { headers });
    } catch (error) {
      throw new UpstreamError(`${label} request failed: ${describeError(error)}`, { cause: error });
    }

    if (response.status !== 200) {
      throw new UpstreamError(`${label} failed with status ${response.status}`, { status: response.status });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new UpstreamError(`${label} returned an undecodable body`, { status: response.status, cause: error });
    }
  },
});
