/**
 * Type Id Tests
 */

import { describe, expect, it } from 'vitest';
import { TypeId, getTypeName, typeIdIsValid } from '../src';

describe('getTypeName', () => {
    it('names the built-in ids', () => {
        expect(getTypeName(TypeId.Type)).toBe('type');
        expect(getTypeName(TypeId.Null)).toBe('null');
        expect(getTypeName(TypeId.Bool)).toBe('bool');
        expect(getTypeName(TypeId.Int)).toBe('int');
        expect(getTypeName(TypeId.UInt)).toBe('uint');
        expect(getTypeName(TypeId.Float)).toBe('float');
        expect(getTypeName(TypeId.Double)).toBe('double');
    });

    it('falls back for anything else', () => {
        expect(getTypeName(TypeId.Invalid)).toBe('(invalid)');
        expect(getTypeName(999)).toBe('(invalid)');
        expect(getTypeName(-1)).toBe('(invalid)');
    });
});

describe('typeIdIsValid', () => {
    it('is false only for the invalid id', () => {
        expect(typeIdIsValid(TypeId.Invalid)).toBe(false);
        expect(typeIdIsValid(TypeId.Double)).toBe(true);
        expect(typeIdIsValid(999)).toBe(true);
    });
});
