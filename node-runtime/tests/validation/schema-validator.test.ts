import { describe, it, expect } from 'vitest';
import {
  checkGroupFields,
  exampleUserData,
  validateForWizard,
  validateUserData,
} from '../../src/validation/schema-validator.js';
import { isRecord } from '../../src/utils/records.js';
import type { PropertySchema, UserDataSchema } from '../../src/types/index.js';
import { dependentsGroup, twoPageSchema, twoPageWizard } from '../helpers/wizards.js';

describe('validateUserData', () => {
  it('accepts data that satisfies the schema', () => {
    const result = validateUserData(twoPageSchema(), { name: 'Ada', country: 'USA' });
    expect(result).toEqual({ valid: true, missingFields: [], invalidFields: [] });
  });

  it('lists missing required fields with their description', () => {
    const result = validateUserData(twoPageSchema(), { country: 'USA' });

    expect(result.valid).toBe(false);
    expect(result.missingFields.map((f) => f.fieldId)).toEqual(['name']);
    expect(result.missingFields[0].description).toBe('Full name');
    expect(result.missingFields[0].examples).toEqual(['Ada Lovelace']);
    expect(result.invalidFields).toEqual([]);
  });

  it('falls back to a placeholder description for undeclared required fields', () => {
    const schema: UserDataSchema = { type: 'object', properties: {}, required: ['ssn'] };
    const result = validateUserData(schema, {});
    expect(result.missingFields[0].description).toBe('No description');
  });

  it('reports a value outside the enum with the allowed values', () => {
    const result = validateUserData(twoPageSchema(), { name: 'Ada', country: 'Mexico' });

    expect(result.invalidFields).toEqual([
      {
        fieldId: 'country',
        providedValue: 'Mexico',
        expected: { type: 'string', enum: ['USA', 'Canada'] },
        reason: 'must be one of: "USA", "Canada"',
      },
    ]);
  });

  it('reports a wrong type', () => {
    const result = validateUserData(twoPageSchema(), { name: 42, country: 'USA' });
    expect(result.invalidFields[0].reason).toBe('must be of type string');
  });

  it('reports every violation in one pass', () => {
    const result = validateUserData(twoPageSchema(), { country: 'Mexico' });

    expect(result.missingFields.map((f) => f.fieldId)).toEqual(['name']);
    expect(result.invalidFields.map((f) => f.fieldId)).toEqual(['country']);
  });

  it('checks patterns and numeric bounds', () => {
    const schema: UserDataSchema = {
      type: 'object',
      properties: {
        zip: { type: 'string', pattern: '^\\d{5}$' },
        age: { type: 'integer', minimum: 18, maximum: 120 },
      },
      required: [],
    };

    const result = validateUserData(schema, { zip: 'abc', age: 16 });

    expect(result.invalidFields).toEqual([
      { fieldId: 'zip', providedValue: 'abc', expected: { type: 'string', pattern: '^\\d{5}$' }, reason: 'must match pattern ^\\d{5}$' },
      { fieldId: 'age', providedValue: 16, expected: { type: 'integer', minimum: 18, maximum: 120 }, reason: 'must be >= 18' },
    ]);
  });

  it('ignores undeclared keys unless additionalProperties is false', () => {
    const open = validateUserData(twoPageSchema(), { name: 'Ada', country: 'USA', nickname: 'A' });
    expect(open.valid).toBe(true);

    const closed = validateUserData(
      { ...twoPageSchema(), additionalProperties: false },
      { name: 'Ada', country: 'USA', nickname: 'A' },
    );
    expect(closed.invalidFields).toEqual([
      { fieldId: 'nickname', providedValue: 'A', expected: {}, reason: 'not declared in schema' },
    ]);
  });

  it('points into nested array items', () => {
    const schema: UserDataSchema = {
      type: 'object',
      properties: {
        dependents: {
          type: 'array',
          items: { type: 'object', properties: { firstName: { type: 'string' } }, required: ['firstName'] },
        },
      },
      required: [],
    };

    const result = validateUserData(schema, { dependents: [{}] });
    expect(result.invalidFields[0].reason).toBe('at 0.firstName: is required');
  });

  it('treats keys named after object members as ordinary data', () => {
    const data = { name: 'Ada', country: 'USA', constructor: 'x', toString: 'y' };

    expect(validateUserData(twoPageSchema(), data)).toEqual({ valid: true, missingFields: [], invalidFields: [] });

    const closed = validateUserData({ ...twoPageSchema(), additionalProperties: false }, data);
    expect(closed.invalidFields.map((f) => f.fieldId)).toEqual(['constructor', 'toString']);
    expect(closed.invalidFields[0].reason).toBe('not declared in schema');
  });

  it('accepts a parsed __proto__ key without touching the prototype', () => {
    const data: unknown = JSON.parse('{"name":"Ada","country":"USA","__proto__":1}');
    if (!isRecord(data)) throw new Error('expected an object');

    const result = validateUserData({ ...twoPageSchema(), additionalProperties: false }, data);

    expect(result.missingFields).toEqual([]);
    expect(result.invalidFields.map((f) => f.fieldId)).toEqual(['__proto__']);
  });

  it('reports a required field named toString when it is absent', () => {
    const toStringProperty: PropertySchema = { type: 'string', description: 'Rendering' };
    const schema: UserDataSchema = {
      type: 'object',
      properties: { toString: toStringProperty },
      required: ['toString'],
    };

    const result = validateUserData(schema, {});

    expect(result.valid).toBe(false);
    expect(result.missingFields.map((f) => f.fieldId)).toEqual(['toString']);
    expect(result.missingFields[0].description).toBe('Rendering');
  });
});

describe('checkGroupFields', () => {
  const wizard = twoPageWizard();
  wizard.pages[0].fields.push(dependentsGroup());

  it('accepts an empty list', () => {
    expect(checkGroupFields(wizard, { dependents: [] })).toEqual([]);
  });

  it('rejects a value that is not a list', () => {
    const [issue] = checkGroupFields(wizard, { dependents: 'none' });
    expect(issue.reason).toBe('must be a list of records');
  });

  it('enforces maxItems', () => {
    const items = Array.from({ length: 4 }, () => ({ firstName: 'Sam' }));
    const [issue] = checkGroupFields(wizard, { dependents: items });
    expect(issue.reason).toBe('must contain at most 3 item(s)');
  });

  it('skips a group whose id names an object member when no value is given', () => {
    const named = twoPageWizard();
    named.pages[0].fields.push(dependentsGroup({ fieldId: 'constructor' }));
    expect(checkGroupFields(named, {})).toEqual([]);
  });

  it('rejects sub-fields the group does not declare', () => {
    const [issue] = checkGroupFields(wizard, { dependents: [{ firstName: 'Sam', age: 4 }] });
    expect(issue.reason).toBe('item 0 has undeclared sub-field "age"');
  });
});

describe('validateForWizard', () => {
  it('combines schema and group checks', () => {
    const wizard = twoPageWizard();
    wizard.pages[0].fields.push(dependentsGroup());

    const result = validateForWizard(wizard, twoPageSchema(), {
      name: 'Ada',
      country: 'USA',
      dependents: [{ nickname: 'x' }],
    });

    expect(result.valid).toBe(false);
    expect(result.invalidFields.map((f) => f.fieldId)).toEqual(['dependents']);
  });

  it('reports a field once when schema and group checks both reject it', () => {
    const wizard = twoPageWizard();
    wizard.pages[0].fields.push(dependentsGroup());
    const schema = twoPageSchema();
    schema.properties.dependents = { type: 'array' };

    const result = validateForWizard(wizard, schema, { name: 'Ada', country: 'USA', dependents: 'none' });

    expect(result.invalidFields).toHaveLength(1);
    expect(result.invalidFields[0].reason).toBe('must be of type array');
  });
});

describe('exampleUserData', () => {
  it('prefers examples, then enum values, then a typed placeholder', () => {
    const schema: UserDataSchema = {
      ...twoPageSchema(),
      properties: {
        ...twoPageSchema().properties,
        age: { type: 'integer', minimum: 18 },
        consent: { type: 'boolean' },
        dependents: { type: 'array' },
      },
    };

    expect(exampleUserData(schema)).toEqual({
      name: 'Ada Lovelace',
      country: 'USA',
      age: 18,
      consent: true,
      dependents: [],
    });
  });
});
