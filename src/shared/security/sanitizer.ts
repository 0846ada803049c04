const DANGEROUS_PATTERN = /<\s*(script|iframe|object|embed)[^>]*>/gi;

function sanitizeString(value: string): string {
  return value.replace(DANGEROUS_PATTERN, '').replace(/javascript:/gi, '');
}

/** Strips active-content tags and `javascript:` from every string in a request payload. */
export function sanitizeInput(input: unknown): unknown {
  if (input == null) {
    return input;
  }

  if (typeof input === 'string') {
    return sanitizeString(input);
  }

  if (Array.isArray(input)) {
    return input.map((value) => sanitizeInput(value));
  }

  if (typeof input === 'object') {
    if (input instanceof Date || Buffer.isBuffer(input)) {
      return input;
    }

    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      result[key] = sanitizeInput(value);
    }
    return result;
  }

  return input;
}
