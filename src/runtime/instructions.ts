/*
 * Tagged Value Runtime - Instructions
 *
 * Operators that dispatch over the live kind of their operands.
 * Non-numeric operands are not an error: the result is the invalid-type
 * cell and callers check `isValid`.
 */

import { apply, type ValueVisitor } from './dispatch';
import {
    type Value, INVALID_TYPE,
    valInt, valUInt, valFloat, valDouble
} from './values';

export type NumericKind = 'int' | 'uint' | 'float' | 'double';

interface NumericOperand {
    kind: NumericKind;
    value: number;
}

const notNumeric = (): NumericOperand | null => null;

const numericOperand: ValueVisitor<NumericOperand | null> = {
    type: notNumeric,
    null: notNumeric,
    bool: notNumeric,
    int: (value) => ({ kind: 'int', value }),
    uint: (value) => ({ kind: 'uint', value }),
    float: (value) => ({ kind: 'float', value }),
    reference: notNumeric,
    double: (value) => ({ kind: 'double', value }),
};

/**
 * Result kind of a binary numeric operator: int/uint < float < double.
 * Mixing int and uint yields uint.
 */
export function promote(a: NumericKind, b: NumericKind): NumericKind {
    if (a === 'double' || b === 'double') return 'double';
    if (a === 'float' || b === 'float') return 'float';
    if (a === 'uint' || b === 'uint') return 'uint';
    return 'int';
}

function sum(kind: NumericKind, lhs: number, rhs: number): Value {
    switch (kind) {
        case 'int':
            return valInt((lhs + rhs) | 0);
        case 'uint':
            return valUInt(((lhs >>> 0) + (rhs >>> 0)) >>> 0);
        case 'float':
            return valFloat(Math.fround(lhs) + Math.fround(rhs));
        case 'double':
            return valDouble(lhs + rhs);
    }
}

/**
 * Numeric addition. The right operand is only decoded once the left one
 * is known to be numeric.
 */
export function valueAdd(lhs: Value, rhs: Value): Value {
    const left = apply(lhs, numericOperand);
    if (left === null) {
        return INVALID_TYPE;
    }

    const right = apply(rhs, numericOperand);
    if (right === null) {
        return INVALID_TYPE;
    }

    return sum(promote(left.kind, right.kind), left.value, right.value);
}

// ============ Instruction Table ============

export const Opcode = {
    Add: 0,
} as const;

export type Opcode = typeof Opcode[keyof typeof Opcode];

export type BinaryInstruction = (lhs: Value, rhs: Value) => Value;

const INSTRUCTIONS: Record<Opcode, BinaryInstruction> = {
    [Opcode.Add]: valueAdd,
};

export function evaluate(op: Opcode, lhs: Value, rhs: Value): Value {
    return INSTRUCTIONS[op](lhs, rhs);
}
