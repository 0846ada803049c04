import { z } from 'zod';

export type FieldValue = string | number | boolean | null | { [key: string]: FieldValue };

export type FieldValueMap = { [key: string]: FieldValue };

export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.record(z.string(), fieldValueSchema)]),
);

export const fieldValueMapSchema = z.record(z.string(), fieldValueSchema);

export function isFieldValueMap(value: FieldValue | undefined): value is FieldValueMap {
  return typeof value === 'object' && value !== null;
}

/** Absent, null, blank, or a map whose leaves are all empty. */
export function isEmptyValue(value: FieldValue | undefined): boolean {
  if (value === undefined || value === null) {
    return true;
  }

  if (typeof value === 'string') {
    return value.trim().length === 0;
  }

  if (isFieldValueMap(value)) {
    return Object.values(value).every((entry) => isEmptyValue(entry));
  }

  return false;
}

export function toNumber(value: FieldValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}
