/**
 * Small request/response helpers shared by the endpoint modules.
 */

import { isRecord } from '../middleware/validate-body.js';
import { NotFoundError, ValidationError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

/** Path segments after `/api/v1`, URI-decoded. */
export function pathSegments(req: Request): string[] {
  const raw = new URL(req.url).pathname.split('/').filter(Boolean).slice(2);
  try {
    return raw.map(decodeURIComponent);
  } catch (err) {
    throw new ValidationError('Malformed path', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

export function segmentAt(req: Request, index: number): string {
  const segment = pathSegments(req)[index];
  if (!segment) throw new NotFoundError('Resource not found');
  return segment;
}

/** The JSON object body. The validate-body middleware has already checked field types. */
export async function readBody(req: Request): Promise<Record<string, unknown>> {
  const body: unknown = await req.json();
  if (!isRecord(body)) throw new ValidationError('Request body must be a JSON object');
  return body;
}

export function stringField(body: Record<string, unknown>, name: string): string {
  const value = body[name];
  if (typeof value !== 'string') throw new ValidationError(`${name} must be a string`);
  return value;
}

export function optionalString(body: Record<string, unknown>, name: string): string | undefined {
  const value = body[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${name} must be a string`);
  return value;
}

export function numberField(body: Record<string, unknown>, name: string): number {
  const value = body[name];
  if (typeof value !== 'number') throw new ValidationError(`${name} must be a number`);
  return value;
}

export function optionalBoolean(body: Record<string, unknown>, name: string): boolean | undefined {
  const value = body[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new ValidationError(`${name} must be a boolean`);
  return value;
}

/** Integer query parameter; undefined when absent. */
export function queryInteger(url: URL, name: string): number | undefined {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) throw new ValidationError(`${name} must be an integer`);
  return value;
}

export function queryNumber(url: URL, name: string): number | undefined {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ValidationError(`${name} must be a number`);
  return value;
}

export function queryFlag(url: URL, name: string): boolean {
  const raw = url.searchParams.get(name);
  return raw === 'true' || raw === '1';
}
