import { describe, expect, it } from 'vitest';

import type { FieldDefinition } from '../../src/modules/category-schemas/types';
import { availableTemplateFields, formatValue, renderTemplate } from '../../src/modules/certificates/template-renderer';

describe('renderTemplate', () => {
  it('substitutes top-level values', () => {
    expect(renderTemplate('{weight} ct {shape}', { weight: 1.02, shape: 'Round' })).toBe('1.02 ct Round');
  });

  it('renders unknown placeholders as empty and collapses whitespace', () => {
    expect(renderTemplate('  Natural {missing}   Sapphire ', {})).toBe('Natural Sapphire');
  });

  it('formats full dimensions in length, width, height order', () => {
    const values = { dimension: { height: '3.9', width: '6.4', length: '6.5' } };
    expect(renderTemplate('Measures {dimension} mm', values)).toBe('Measures 6.5 x 6.4 x 3.9 mm');
  });

  it('joins partial dimensions without gaps', () => {
    expect(renderTemplate('{dimension}', { dimension: { length: 1, width: 2 } })).toBe('1 x 2');
    expect(renderTemplate('{dimension}', { dimension: { length: 5, width: '', height: 3 } })).toBe('5 x 3');
  });

  it('joins other maps with commas, skipping empty leaves', () => {
    const values = { treatment: { primary: 'Heated', secondary: '', note: 'Minor' } };
    expect(renderTemplate('{treatment}', values)).toBe('Heated, Minor');
  });

  it('reads dotted paths', () => {
    expect(renderTemplate('L {dimension.length}', { dimension: { length: '6.5' } })).toBe('L 6.5');
    expect(renderTemplate('L {dimension.depth}', { dimension: { length: '6.5' } })).toBe('L');
  });

  it('ignores inherited properties', () => {
    expect(renderTemplate('a {constructor} b {toString} c', {})).toBe('a b c');
  });

  it('returns an empty string without a template', () => {
    expect(renderTemplate(null, { weight: 1 })).toBe('');
    expect(renderTemplate(undefined, {})).toBe('');
    expect(renderTemplate('', {})).toBe('');
  });
});

describe('formatValue', () => {
  it('stringifies scalars', () => {
    expect(formatValue(true)).toBe('true');
    expect(formatValue(0)).toBe('0');
    expect(formatValue(null)).toBe('');
    expect(formatValue(undefined)).toBe('');
  });
});

describe('availableTemplateFields', () => {
  it('lists field names and composite sub-field paths, sorted', () => {
    const fields: FieldDefinition[] = [
      { fieldId: 'f1', label: 'Weight', fieldName: 'weight', fieldType: 'number', isRequired: true, displayOrder: 0 },
      {
        fieldId: 'f2',
        label: 'Dimension',
        fieldName: 'dimension',
        fieldType: 'composite',
        isRequired: false,
        displayOrder: 1,
        subFields: [
          { name: 'Length', fieldName: 'length', fieldType: 'number', isRequired: true, displayOrder: 0 },
          { name: 'Width', fieldName: 'width', fieldType: 'number', isRequired: true, displayOrder: 1 },
        ],
      },
      { fieldId: 'f3', label: 'Colour', fieldName: 'color', fieldType: 'dropdown', isRequired: false, displayOrder: 2 },
    ];

    expect(availableTemplateFields(fields)).toEqual([
      'color',
      'dimension',
      'dimension.length',
      'dimension.width',
      'weight',
    ]);
  });
});
