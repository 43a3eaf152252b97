import path from 'path';
import { safeDecodeURIComponent } from '../services/listingParser.js';

function isPlainSegment(segment: string): boolean {
  return segment !== '' && segment !== '.' && segment !== '..' && !/[/\\]/.test(segment);
}

/**
 * Local name for one URL path segment: percent-decoded when the decoded
 * form is a plain name, the raw segment otherwise, null when neither is.
 */
export function toLocalSegment(rawSegment: string): string | null {
  const decoded = safeDecodeURIComponent(rawSegment);
  if (isPlainSegment(decoded)) {
    return decoded;
  }
  return isPlainSegment(rawSegment) ? rawSegment : null;
}

/**
 * Join `name` under `root`, or null when the result would leave `root`
 */
export function joinInside(root: string, name: string): string | null {
  const base = path.resolve(root);
  const joined = path.join(root, name);
  const resolved = path.resolve(joined);
  return resolved.startsWith(base + path.sep) ? joined : null;
}

/**
 * True when `candidate` has the same origin as `listingUrl` and sits strictly below its directory
 */
export function isBelow(listingUrl: string, candidate: string): boolean {
  const parent = new URL(listingUrl);
  const child = new URL(candidate);
  if (child.origin !== parent.origin) {
    return false;
  }
  const directory = parent.pathname.slice(0, parent.pathname.lastIndexOf('/') + 1);
  return child.pathname.startsWith(directory) && child.pathname !== directory && child.pathname !== parent.pathname;
}
