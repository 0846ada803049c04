import type { FieldDefinition } from '../category-schemas/types';
import { FieldValidationError, RequiredFieldMissingError } from './errors';
import { isEmptyValue, isFieldValueMap, toNumber } from './field-values';
import type { FieldValue, FieldValueMap } from './field-values';

function isVisible(field: FieldDefinition, byId: Map<string, FieldDefinition>, values: FieldValueMap): boolean {
  const logic = field.conditionalLogic;
  if (!logic) {
    return true;
  }

  const controller = byId.get(logic.showIfField);
  if (!controller) {
    return true;
  }

  const current = values[controller.fieldName];
  if (current === undefined || current === null || isFieldValueMap(current)) {
    return false;
  }

  return String(current) === logic.showIfValue;
}

/** A required checkbox is satisfied only when checked. */
function isUnchecked(field: FieldDefinition, value: FieldValue | undefined): boolean {
  if (field.fieldType !== 'checkbox') {
    return false;
  }
  return value === false || (typeof value === 'string' && value.trim().toLowerCase() === 'false');
}

function fail(field: FieldDefinition, fallback: string): never {
  throw new FieldValidationError(field.label, field.validation?.customErrorMessage ?? fallback);
}

function checkComposite(field: FieldDefinition, value: FieldValue | undefined): void {
  const entries: FieldValueMap = isFieldValueMap(value) ? value : {};
  const enforceRequired = field.isRequired || !isEmptyValue(value);

  for (const subField of field.subFields ?? []) {
    const subValue = entries[subField.fieldName];

    if (isEmptyValue(subValue)) {
      if (enforceRequired && subField.isRequired) {
        throw new RequiredFieldMissingError(`${field.label} ${subField.name}`);
      }
      continue;
    }

    if (toNumber(subValue) === null) {
      throw new FieldValidationError(`${field.label} ${subField.name}`, `${subField.name} must be a number`);
    }
  }
}

function checkRules(field: FieldDefinition, value: FieldValue): void {
  const rules = field.validation;

  if (field.fieldType === 'number' && toNumber(value) === null) {
    fail(field, `${field.label} must be a number`);
  }

  if (!rules) {
    return;
  }

  if (typeof value === 'string') {
    const length = value.trim().length;
    if (rules.minLength != null && length < rules.minLength) {
      fail(field, `${field.label} must be at least ${rules.minLength} characters`);
    }
    if (rules.maxLength != null && length > rules.maxLength) {
      fail(field, `${field.label} must be at most ${rules.maxLength} characters`);
    }
    if (rules.pattern && !new RegExp(`^(?:${rules.pattern})$`).test(value.trim())) {
      fail(field, `${field.label} has an invalid format`);
    }
  }

  if (rules.minValue != null || rules.maxValue != null) {
    const numeric = toNumber(value);
    if (numeric === null) {
      fail(field, `${field.label} must be a number`);
    }
    if (rules.minValue != null && numeric < rules.minValue) {
      fail(field, `${field.label} must be at least ${rules.minValue}`);
    }
    if (rules.maxValue != null && numeric > rules.maxValue) {
      fail(field, `${field.label} must be at most ${rules.maxValue}`);
    }
  }
}

/**
 * Checks submitted values against a schema's fields in display order and
 * throws on the first violation. Fields hidden by their conditional logic
 * are not checked.
 */
export function validateFieldValues(fields: readonly FieldDefinition[], values: FieldValueMap): void {
  const ordered = [...fields].sort((a, b) => a.displayOrder - b.displayOrder);
  const byId = new Map(fields.map((field) => [field.fieldId, field]));

  for (const field of ordered) {
    if (!isVisible(field, byId, values)) {
      continue;
    }

    const value = values[field.fieldName];

    if (field.fieldType === 'composite') {
      if (field.isRequired && isEmptyValue(value)) {
        throw new RequiredFieldMissingError(field.label);
      }
      checkComposite(field, value);
      continue;
    }

    if (isEmptyValue(value) || isUnchecked(field, value)) {
      if (field.isRequired) {
        throw new RequiredFieldMissingError(field.label);
      }
      continue;
    }

    checkRules(field, value);
  }
}
