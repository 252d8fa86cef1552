/*
 * Tagged Value Runtime - Value Representation
 *
 * Every value is one 64-bit word. The upper 16 bits pick the layout.
 *
 * Short layout (upper 16 bits = 0xffff):
 * - Bits 32-63: tag
 *     type:        0xffff0000 + 32-bit type id
 *     null:        0xffff0001 + 00000000
 *     bool(true):  0xffff0002 + 00000001
 *     bool(false): 0xffff0002 + 00000000
 *     int:         0xffff0003 + 32-bit payload
 *     uint:        0xffff0004 + 32-bit payload
 *     float:       0xffff0005 + 32-bit payload
 * - Bits 0-31: payload
 *
 * Reference layout (upper 16 bits = 0x0000):
 * - Bits 0-47: handle of a heap object owned by the host
 *   (string, tuple, array, function, object, native handle)
 *
 * Double layout (upper 16 bits in 0x0001..0xfffe):
 * - IEEE 754 bits + 0x0001000000000000
 */

import { assertionsEnabled, debugLog } from './config';
import { ValueContractError, ValueRangeError, formatBits } from './errors';
import { TypeId, getTypeName } from './typeId';

/**
 * A value cell. Always an unsigned 64-bit word.
 */
export type Value = bigint;

// Layouts
export const LAYOUT_MASK = 0xffff000000000000n;
export const SHORT_LAYOUT = 0xffff000000000000n;
export const REFERENCE_LAYOUT = 0x0000000000000000n;

// Short layout tags (bits 32-63)
export const TAG_SHIFT = 32n;
export const TAG_TYPE_ID = 0xffff0000n;
export const TAG_NULL = 0xffff0001n;
export const TAG_BOOL = 0xffff0002n;
export const TAG_INT = 0xffff0003n;
export const TAG_UINT = 0xffff0004n;
export const TAG_FLOAT = 0xffff0005n;
export const PAYLOAD_MASK = 0xffffffffn;

export const DOUBLE_ENCODING_OFFSET = 0x0001000000000000n;
export const REFERENCE_MASK = 0x0000ffffffffffffn;
export const MAX_REFERENCE = 0xffffffffffff;

const WORD_MASK = 0xffffffffffffffffn;
const CANONICAL_NAN_BITS = 0x7ff8000000000000n;
// Raw double bits from here up would land in the short or reference layout
const DOUBLE_COLLISION_START = 0xfffe000000000000n;

function shortValue(tag: bigint, payload: bigint): Value {
    return (tag << TAG_SHIFT) | payload;
}

// Special values
export const INVALID_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.Invalid));
export const TYPE_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.Type));
export const NULL_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.Null));
export const BOOL_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.Bool));
export const INT_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.Int));
export const UINT_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.UInt));
export const FLOAT_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.Float));
export const DOUBLE_TYPE = shortValue(TAG_TYPE_ID, BigInt(TypeId.Double));

export const NULL_VALUE = shortValue(TAG_NULL, 0n);
export const TRUE_VALUE = shortValue(TAG_BOOL, 1n);
export const FALSE_VALUE = shortValue(TAG_BOOL, 0n);

// Scratch space for bit reinterpretation
const scratch = new DataView(new ArrayBuffer(8));

function doubleToBits(n: number): bigint {
    scratch.setFloat64(0, n, true);
    return scratch.getBigUint64(0, true);
}

function bitsToDouble(bits: bigint): number {
    scratch.setBigUint64(0, bits, true);
    return scratch.getFloat64(0, true);
}

function floatToBits(n: number): bigint {
    scratch.setFloat32(0, n, true);
    return BigInt(scratch.getUint32(0, true));
}

function bitsToFloat(bits: bigint): number {
    scratch.setUint32(0, Number(bits), true);
    return scratch.getFloat32(0, true);
}

function expectKind(matches: boolean, kind: string, v: Value): void {
    if (!matches && assertionsEnabled()) {
        throw new ValueContractError(kind, v);
    }
}

/**
 * Wrap a raw 64-bit word without interpreting it.
 */
export function fromBits(bits: bigint): Value {
    if (bits < 0n || bits > WORD_MASK) {
        throw new ValueRangeError(`Raw value ${bits} does not fit in 64 bits`);
    }
    return bits;
}

// ============ Construction ============

export function valTypeId(id: TypeId): Value {
    return shortValue(TAG_TYPE_ID, BigInt(id >>> 0));
}

export function valNull(): Value {
    return NULL_VALUE;
}

export function valBool(b: boolean): Value {
    return b ? TRUE_VALUE : FALSE_VALUE;
}

export function valTrue(): Value {
    return TRUE_VALUE;
}

export function valFalse(): Value {
    return FALSE_VALUE;
}

/**
 * Create an int value. The number is converted as by `n | 0`.
 */
export function valInt(n: number): Value {
    return shortValue(TAG_INT, BigInt((n | 0) >>> 0));
}

/**
 * Create a uint value. The number is converted as by `n >>> 0`.
 */
export function valUInt(n: number): Value {
    return shortValue(TAG_UINT, BigInt(n >>> 0));
}

/**
 * Create a float value, rounding to single precision.
 */
export function valFloat(n: number): Value {
    return shortValue(TAG_FLOAT, floatToBits(n));
}

/**
 * Create a reference value from a heap handle.
 * The cell does not own the referent.
 */
export function valReference(handle: number): Value {
    if (!Number.isSafeInteger(handle) || handle < 0 || handle > MAX_REFERENCE) {
        throw new ValueRangeError(`Reference handle ${handle} does not fit in 48 bits`);
    }
    return BigInt(handle);
}

export function valDouble(n: number): Value {
    return valDoubleBits(doubleToBits(n));
}

/**
 * Create a double value from its raw IEEE 754 bits.
 *
 * Negative NaNs whose bits start with 0xfffe or 0xffff have no encoding
 * and become the canonical quiet NaN. Every other pattern, NaN payloads
 * included, is kept exactly.
 */
export function valDoubleBits(raw: bigint): Value {
    let bits = fromBits(raw);
    if (bits >= DOUBLE_COLLISION_START) {
        debugLog(`Double ${formatBits(bits)} collides with another layout, storing canonical NaN`);
        bits = CANONICAL_NAN_BITS;
    }
    return bits + DOUBLE_ENCODING_OFFSET;
}

// ============ Layout Checking ============

export function isShortLayout(v: Value): boolean {
    return (v & LAYOUT_MASK) === SHORT_LAYOUT;
}

export function isReferenceLayout(v: Value): boolean {
    return (v & LAYOUT_MASK) === REFERENCE_LAYOUT;
}

export function isDoubleLayout(v: Value): boolean {
    return !isShortLayout(v) && !isReferenceLayout(v);
}

/**
 * The short-layout tag. Only meaningful when `isShortLayout(v)`.
 */
export function shortTag(v: Value): bigint {
    return v >> TAG_SHIFT;
}

// ============ Type Checking ============

export function isTypeId(v: Value): boolean {
    return shortTag(v) === TAG_TYPE_ID;
}

export function isNull(v: Value): boolean {
    return shortTag(v) === TAG_NULL;
}

export function isBool(v: Value): boolean {
    return shortTag(v) === TAG_BOOL;
}

export function isTrue(v: Value): boolean {
    return v === TRUE_VALUE;
}

export function isFalse(v: Value): boolean {
    return v === FALSE_VALUE;
}

export function isInt(v: Value): boolean {
    return shortTag(v) === TAG_INT;
}

export function isUInt(v: Value): boolean {
    return shortTag(v) === TAG_UINT;
}

export function isFloat(v: Value): boolean {
    return shortTag(v) === TAG_FLOAT;
}

export function isReference(v: Value): boolean {
    return isReferenceLayout(v);
}

export function isDouble(v: Value): boolean {
    return isDoubleLayout(v);
}

export function isNumeric(v: Value): boolean {
    return isInt(v) || isUInt(v) || isFloat(v) || isDouble(v);
}

export function isValid(v: Value): boolean {
    return v !== INVALID_TYPE;
}

/**
 * A short-layout word whose tag is none of the defined ones.
 */
export function isCorrupt(v: Value): boolean {
    return isShortLayout(v) && getType(v) === TypeId.Invalid;
}

// ============ Value Extraction ============
//
// With assertions disabled these decode the payload bits whatever the
// live kind is.

export function asTypeId(v: Value): TypeId {
    expectKind(isTypeId(v), 'type', v);
    return Number(v & PAYLOAD_MASK);
}

export function asNull(v: Value): null {
    expectKind(isNull(v), 'null', v);
    return null;
}

export function asBool(v: Value): boolean {
    expectKind(isBool(v), 'bool', v);
    return v === TRUE_VALUE;
}

export function asInt(v: Value): number {
    expectKind(isInt(v), 'int', v);
    return Number(v & PAYLOAD_MASK) | 0;
}

export function asUInt(v: Value): number {
    expectKind(isUInt(v), 'uint', v);
    return Number(v & PAYLOAD_MASK);
}

export function asFloat(v: Value): number {
    expectKind(isFloat(v), 'float', v);
    return bitsToFloat(v & PAYLOAD_MASK);
}

export function asReference(v: Value): number {
    expectKind(isReference(v), 'reference', v);
    return Number(v & REFERENCE_MASK);
}

export function asDouble(v: Value): number {
    return bitsToDouble(asDoubleBits(v));
}

/**
 * Raw IEEE 754 bits of a double value.
 */
export function asDoubleBits(v: Value): bigint {
    expectKind(isDouble(v), 'double', v);
    return (v - DOUBLE_ENCODING_OFFSET) & WORD_MASK;
}

// ============ Type Name ============

export function getType(v: Value): TypeId {
    if (isShortLayout(v)) {
        switch (shortTag(v)) {
            case TAG_TYPE_ID: return TypeId.Type;
            case TAG_NULL: return TypeId.Null;
            case TAG_BOOL: return TypeId.Bool;
            case TAG_INT: return TypeId.Int;
            case TAG_UINT: return TypeId.UInt;
            case TAG_FLOAT: return TypeId.Float;
            default: return TypeId.Invalid;
        }
    }

    if (isReferenceLayout(v)) {
        // Referenced objects carry their type in the heap, which is not modelled here
        return TypeId.Invalid;
    }

    return TypeId.Double;
}

export function typeName(v: Value): string {
    return getTypeName(getType(v));
}
