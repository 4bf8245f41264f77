/**
 * User ids are Supabase Auth uuids. Anything else cannot match a row, and
 * Postgres would reject it as a uuid cast error.
 */

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID.test(value);
}

/** Lower-case form, which is how Postgres prints a uuid. */
export function canonicalUserId(value: string): string | null {
  return isUuid(value) ? value.toLowerCase() : null;
}
