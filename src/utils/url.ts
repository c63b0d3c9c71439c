import { URL } from 'node:url';

// Resolution only: no tracking-param, trailing-slash or fragment cleanup, so
// two links are the same record only when they resolve to the same string.
export function toAbsoluteUrl(value: string, base: string): string {
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export function sameHost(urlA: string, urlB: string): boolean {
  try {
    return new URL(urlA).hostname === new URL(urlB).hostname;
  } catch {
    return false;
  }
}

export function pathnameOf(value: string): string {
  try {
    return new URL(value).pathname;
  } catch {
    return '';
  }
}
