/**
 * Instruction Tests - numeric addition and promotion
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
    Opcode, TypeId, configureRuntime, resetRuntimeConfig,
    evaluate, promote, valueAdd,
    INVALID_TYPE, fromBits, isValid, asFloat,
    valTypeId, valNull, valTrue, valInt, valUInt, valFloat, valReference, valDouble,
} from '../src';

const corrupt = fromBits(0xffff00ff00000000n);

afterEach(() => {
    resetRuntimeConfig();
});

describe('promote', () => {
    it('widens int/uint < float < double', () => {
        expect(promote('int', 'int')).toBe('int');
        expect(promote('int', 'uint')).toBe('uint');
        expect(promote('uint', 'int')).toBe('uint');
        expect(promote('uint', 'float')).toBe('float');
        expect(promote('float', 'int')).toBe('float');
        expect(promote('float', 'double')).toBe('double');
        expect(promote('double', 'uint')).toBe('double');
    });
});

describe('valueAdd', () => {
    it('adds ints as int', () => {
        expect(valueAdd(valInt(1), valInt(2))).toBe(valInt(3));
        expect(valueAdd(valInt(-5), valInt(2))).toBe(valInt(-3));
    });

    it('wraps int overflow', () => {
        expect(valueAdd(valInt(2147483647), valInt(1))).toBe(valInt(-2147483648));
    });

    it('adds mixed int and uint as uint', () => {
        expect(valueAdd(valUInt(4000000000), valInt(5))).toBe(0xffff0004ee6b2805n);
        expect(valueAdd(valInt(-1), valUInt(0))).toBe(valUInt(4294967295));
        expect(valueAdd(valUInt(4294967295), valInt(1))).toBe(valUInt(0));
        expect(valueAdd(valUInt(3), valUInt(4))).toBe(valUInt(7));
    });

    it('adds into float at single precision', () => {
        expect(valueAdd(valInt(1), valFloat(2.5))).toBe(valFloat(3.5));
        expect(valueAdd(valFloat(16777216), valInt(1))).toBe(valFloat(16777216));
        expect(valueAdd(valFloat(0.5), valFloat(0.25))).toBe(valFloat(0.75));
        expect(asFloat(valueAdd(valUInt(4294967295), valFloat(0)))).toBe(4294967296);
    });

    it('adds into double', () => {
        expect(valueAdd(valDouble(1.5), valInt(2))).toBe(valDouble(3.5));
        expect(valueAdd(valUInt(4294967295), valDouble(1))).toBe(valDouble(4294967296));
        expect(valueAdd(valFloat(0.1), valDouble(0.2))).toBe(valDouble(Math.fround(0.1) + 0.2));
        expect(valueAdd(valDouble(0.1), valDouble(0.2))).toBe(valDouble(0.1 + 0.2));
    });

    it('returns the invalid type for non-numeric operands', () => {
        const cases = [
            [valNull(), valInt(1)],
            [valTrue(), valDouble(1)],
            [valReference(0x1000), valInt(1)],
            [valInt(1), valReference(0x1000)],
            [valTypeId(TypeId.Int), valInt(1)],
            [valInt(1), valNull()],
            [valFloat(1), corrupt],
        ];
        for (const [lhs, rhs] of cases) {
            const result = valueAdd(lhs, rhs);
            expect(result).toBe(INVALID_TYPE);
            expect(isValid(result)).toBe(false);
        }
    });

    it('does not decode the right operand when the left is not numeric', () => {
        const log = vi.fn();
        configureRuntime({ debug: true, log });

        expect(valueAdd(valNull(), corrupt)).toBe(INVALID_TYPE);
        expect(log).not.toHaveBeenCalled();

        expect(valueAdd(valInt(1), corrupt)).toBe(INVALID_TYPE);
        expect(log).toHaveBeenCalledTimes(1);
    });

    it('never throws with assertions enabled', () => {
        configureRuntime({ assertions: true });

        expect(valueAdd(valReference(8), valTrue())).toBe(INVALID_TYPE);
        expect(valueAdd(valDouble(2), valFloat(0.5))).toBe(valDouble(2.5));
    });
});

describe('evaluate', () => {
    it('runs the add instruction', () => {
        expect(Opcode.Add).toBe(0);
        expect(evaluate(Opcode.Add, valInt(1), valInt(2))).toBe(valInt(3));
        expect(evaluate(Opcode.Add, valNull(), valInt(2))).toBe(INVALID_TYPE);
    });
});
