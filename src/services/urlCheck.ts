import type { Transport } from './transport.js';

export interface UrlCheckResult {
  reachable: boolean;
  statusCode?: number;
  finalUrl: string;
  message: string;
}

/**
 * Embed credentials as URL user-info when both are present.
 * Otherwise the URL is returned as given.
 */
export function buildFinalUrl(rawUrl: string, username?: string, password?: string): string {
  if (!username || !password) {
    return rawUrl;
  }
  const url = new URL(rawUrl);
  // the URL setters percent-encode reserved characters
  url.username = username;
  url.password = password;
  return url.toString();
}

/**
 * HEAD the URL without following redirects and describe what the operator should do next
 */
export async function checkUrl(
  transport: Transport,
  rawUrl: string,
  username?: string,
  password?: string
): Promise<UrlCheckResult> {
  const finalUrl = buildFinalUrl(rawUrl, username, password);

  try {
    const { statusCode, location } = await transport.fetchHead(finalUrl);

    if (statusCode === 200) {
      return { reachable: true, statusCode, finalUrl, message: 'URL is reachable.' };
    }
    if (location !== undefined) {
      return { reachable: true, statusCode, finalUrl: location, message: `URL redirected to ${location}` };
    }
    if (statusCode === 401) {
      return {
        reachable: false,
        statusCode,
        finalUrl,
        message: 'Authentication required. Please enter username and password.'
      };
    }
    return { reachable: false, statusCode, finalUrl, message: `Error: Received status code ${statusCode}` };
  } catch (error) {
    return {
      reachable: false,
      finalUrl,
      message: `Error: ${error instanceof Error ? error.message : String(error)}`
    };
  }
}
