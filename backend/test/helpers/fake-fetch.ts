import { FetchLike, HttpResponse } from '../../src/utils/http-client';

export interface FakeRoute {
  status?: number;
  body?: unknown;
  invalidJson?: boolean;
  error?: Error;
}

export interface RecordedCall {
  url: string;
  headers: Record<string, string>;
}

const notFound: HttpResponse = { ok: false, status: 404, json: async () => ({ detail: 'not found' }) };

/** Serves canned responses by longest matching URL prefix and records every call. */
export const createFakeFetch = (routes: Record<string, FakeRoute>) => {
  const calls: RecordedCall[] = [];
  const prefixes = Object.keys(routes).sort((a, b) => b.length - a.length);

  const fetchImpl: FetchLike = async (url, options = {}) => {
    calls.push({ url, headers: options.headers ?? {} });
    const prefix = prefixes.find((candidate) => url.startsWith(candidate));
    if (prefix === undefined) {
      return notFound;
    }
    const route = routes[prefix];
    if (route.error) {
      throw route.error;
    }
    const status = route.status ?? 200;
    return {
      ok: status >= 200 && status < 300,
      status,
      json: async () => {
        if (route.invalidJson) {
          throw new SyntaxError('Unexpected token < in JSON at position 0');
        }
        return route.body;
      },
    };
  };

  return { fetchImpl, calls };
};
