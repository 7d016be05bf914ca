// Pure HTTP utility functions
// All functions are pure - no side effects

import type { QueryParams } from './types.js';

/**
 * Build URL from base URL, endpoint and optional query parameters.
 * Query parameters whose value is undefined are left out.
 */
export const buildUrl = (baseUrl: string, endpoint: string, query?: QueryParams): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  let url = cleanBaseUrl;
  if (endpoint && endpoint !== '/') {
    url += endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  }

  if (!query) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }

  const search = params.toString();
  if (!search) {
    return url;
  }

  return `${url}${url.includes('?') ? '&' : '?'}${search}`;
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'api-key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};
