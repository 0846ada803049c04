import { z } from 'zod';

import type { Identity } from '../modules/auth/roles';

const identitySchema = z.object({
  userId: z.string(),
  name: z.string(),
  email: z.string(),
});

export function toIsoString(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }

  const date = new Date(String(value));
  return Number.isNaN(date.getTime()) ? String(value) : date.toISOString();
}

export function parseJsonColumn(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export function parseIdentity(value: unknown): Identity | null {
  const parsed = identitySchema.safeParse(parseJsonColumn(value));
  return parsed.success ? parsed.data : null;
}

/** Escapes `%`, `_` and `\` for use inside a `like` pattern. */
export function likePattern(search: string): string {
  return `%${search.toLowerCase().replace(/[\\%_]/g, (match) => `\\${match}`)}%`;
}
