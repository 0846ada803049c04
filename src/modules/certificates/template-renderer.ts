import type { FieldDefinition } from '../category-schemas/types';
import { isFieldValueMap } from './field-values';
import type { FieldValue, FieldValueMap } from './field-values';

const PLACEHOLDER_PATTERN = /\{([^}]+)\}/g;
const DIMENSION_KEYS = ['length', 'width', 'height'] as const;

function lookup(values: FieldValueMap, path: string): FieldValue | undefined {
  let current: FieldValue | undefined = values;

  for (const segment of path.split('.')) {
    const key = segment.trim();
    if (!isFieldValueMap(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

function isDimensional(value: FieldValueMap): boolean {
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => DIMENSION_KEYS.some((dimension) => dimension === key));
}

function leafValues(value: FieldValueMap): string[] {
  return Object.values(value).flatMap((entry) => (isFieldValueMap(entry) ? leafValues(entry) : [formatValue(entry)]));
}

export function formatValue(value: FieldValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }

  if (isFieldValueMap(value)) {
    if (isDimensional(value)) {
      return DIMENSION_KEYS.map((key) => formatValue(value[key]).trim())
        .filter((part) => part.length > 0)
        .join(' x ');
    }

    return leafValues(value)
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .join(', ');
  }

  return String(value);
}

/**
 * Substitutes `{path}` placeholders with submitted values. Never throws:
 * unknown or empty placeholders render as an empty string.
 */
export function renderTemplate(template: string | null | undefined, values: FieldValueMap): string {
  if (!template) {
    return '';
  }

  return template
    .replace(PLACEHOLDER_PATTERN, (_match, path: string) => formatValue(lookup(values, path.trim())))
    .replace(/\s+/g, ' ')
    .trim();
}

/** Placeholder paths a description template may reference, sorted. */
export function availableTemplateFields(fields: readonly FieldDefinition[]): string[] {
  const paths = new Set<string>();

  for (const field of fields) {
    paths.add(field.fieldName);
    if (field.fieldType === 'composite') {
      for (const subField of field.subFields ?? []) {
        paths.add(`${field.fieldName}.${subField.fieldName}`);
      }
    }
  }

  return Array.from(paths).sort();
}
