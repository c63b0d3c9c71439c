import { MAX_LIMIT, MIN_LIMIT } from '../pipeline/normalize.js';

export const DEFAULT_LIMIT = 20;

export class QueryParamError extends Error {
  name = 'QueryParamError';
}

function single(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  throw new QueryParamError('query parameter must be a string');
}

export function parseLimit(value: unknown): number {
  const raw = single(value);
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_LIMIT;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < MIN_LIMIT || parsed > MAX_LIMIT) {
    throw new QueryParamError(`limit must be an integer between ${MIN_LIMIT} and ${MAX_LIMIT}`);
  }
  return parsed;
}

export function parseFlag(value: unknown, name = 'details'): boolean {
  const raw = single(value)?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return false;
  }
  if (raw === 'true' || raw === '1') {
    return true;
  }
  if (raw === 'false' || raw === '0') {
    return false;
  }
  throw new QueryParamError(`${name} must be true or false`);
}
