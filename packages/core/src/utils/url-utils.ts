/**
 * URL predicates shared by the model's validation rules.
 */

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:', 'ftp:', 'file:']);
const HOST_REQUIRED = new Set(['http:', 'https:', 'ftp:']);

/**
 * Check whether a string is an absolute URL with a supported scheme.
 * Network schemes (http, https, ftp) must also name a host, so
 * `localhost:8080` and `foo:bar` are rejected.
 */
export function isUrl(url: string): boolean {
  if (url.trim().length === 0) return false;
  try {
    const urlObj = new URL(url);
    if (!SUPPORTED_PROTOCOLS.has(urlObj.protocol)) return false;
    return !HOST_REQUIRED.has(urlObj.protocol) || urlObj.hostname.length > 0;
  } catch {
    return false;
  }
}
