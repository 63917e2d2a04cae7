import { TypedError } from '../src/domain/errors';
import { isRecord, isString, isStringArray, isStringRecord, optionalField, schemaError } from '../src/guards';

describe('guards', () => {
  test('isRecord rejects arrays and null', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });

  test('string collections', () => {
    expect(isStringArray(['a', 'b'])).toBe(true);
    expect(isStringArray(['a', 1])).toBe(false);
    expect(isStringRecord({ os: 'linux' })).toBe(true);
    expect(isStringRecord({ os: 1 })).toBe(false);
  });

  test('schemaError describes the received value', () => {
    expect(schemaError('matrix.dimensions', 'object', null).message).toBe('matrix.dimensions: expected object, got null');
    expect(schemaError('x', 'string', [1]).message).toBe('x: expected string, got array');
  });

  describe('optionalField', () => {
    test('returns absent and valid values without errors', () => {
      const errors: TypedError[] = [];
      expect(optionalField({}, 'name', 'stage', isString, 'string', errors)).toBeUndefined();
      expect(optionalField({ name: 'docs' }, 'name', 'stage', isString, 'string', errors)).toBe('docs');
      expect(errors).toEqual([]);
    });

    test('records a schema error for the wrong type', () => {
      const errors: TypedError[] = [];
      expect(optionalField({ name: 3 }, 'name', 'stages[0]', isString, 'string', errors)).toBeUndefined();
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe('VALIDATION.SCHEMA');
      expect(errors[0].message).toBe('stages[0].name: expected string, got number');
      expect(errors[0].details).toEqual({ path: 'stages[0].name', expected: 'string' });
    });
  });
});
