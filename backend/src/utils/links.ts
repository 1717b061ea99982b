import { QUERY_PARAMS } from '@rollcall/shared';
import { config } from '../config.js';

type TokenParam = (typeof QUERY_PARAMS)[keyof typeof QUERY_PARAMS];

// Public URL that routes an anonymous visitor into a token flow.
export function shareUrl(param: TokenParam, token: string): string {
  const url = new URL(config.access.publicBaseUrl);
  url.searchParams.set(param, token);
  return url.toString();
}
