/*
 * Tagged Value Runtime - Dispatch
 *
 * Decodes a cell into its live kind and native value, and routes it to
 * exactly one arm of a visitor.
 */

import { debugLog } from './config';
import { formatBits } from './errors';
import { TypeId, getTypeName } from './typeId';
import {
    type Value,
    TAG_TYPE_ID, TAG_NULL, TAG_BOOL, TAG_INT, TAG_UINT, TAG_FLOAT,
    isShortLayout, isReferenceLayout, isCorrupt, shortTag,
    asTypeId, asBool, asInt, asUInt, asFloat, asReference, asDouble
} from './values';

/**
 * The live kind of a cell together with its native value.
 */
export type DecodedValue =
    | { kind: 'type'; value: TypeId }
    | { kind: 'null'; value: null }
    | { kind: 'bool'; value: boolean }
    | { kind: 'int'; value: number }
    | { kind: 'uint'; value: number }
    | { kind: 'float'; value: number }
    | { kind: 'reference'; value: number }
    | { kind: 'double'; value: number };

export type ValueKind = DecodedValue['kind'];

/**
 * One continuation per kind. `apply` calls exactly one of them.
 */
export interface ValueVisitor<R> {
    type(id: TypeId): R;
    null(value: null): R;
    bool(value: boolean): R;
    int(value: number): R;
    uint(value: number): R;
    float(value: number): R;
    reference(handle: number): R;
    double(value: number): R;
}

/**
 * Decode a cell. An unknown short-layout tag decodes as null.
 */
export function decode(v: Value): DecodedValue {
    if (isShortLayout(v)) {
        switch (shortTag(v)) {
            case TAG_TYPE_ID:
                return { kind: 'type', value: asTypeId(v) };
            case TAG_NULL:
                return { kind: 'null', value: null };
            case TAG_BOOL:
                return { kind: 'bool', value: asBool(v) };
            case TAG_INT:
                return { kind: 'int', value: asInt(v) };
            case TAG_UINT:
                return { kind: 'uint', value: asUInt(v) };
            case TAG_FLOAT:
                return { kind: 'float', value: asFloat(v) };
            default:
                debugLog(`Invalid tag, value corruption detected: ${formatBits(v)}`);
                return { kind: 'null', value: null };
        }
    }

    if (isReferenceLayout(v)) {
        return { kind: 'reference', value: asReference(v) };
    }

    return { kind: 'double', value: asDouble(v) };
}

export function apply<R>(v: Value, visitor: ValueVisitor<R>): R {
    const decoded = decode(v);
    switch (decoded.kind) {
        case 'type': return visitor.type(decoded.value);
        case 'null': return visitor.null(decoded.value);
        case 'bool': return visitor.bool(decoded.value);
        case 'int': return visitor.int(decoded.value);
        case 'uint': return visitor.uint(decoded.value);
        case 'float': return visitor.float(decoded.value);
        case 'reference': return visitor.reference(decoded.value);
        case 'double': return visitor.double(decoded.value);
    }
}

// ============ Debug String ============

const formatter: ValueVisitor<string> = {
    type: (id) => `type(${getTypeName(id)})`,
    null: () => 'null',
    bool: (b) => b ? 'true' : 'false',
    int: (n) => `int(${n})`,
    uint: (n) => `uint(${n})`,
    float: (n) => `float(${n})`,
    reference: (handle) => `ref@0x${handle.toString(16)}`,
    double: (n) => `double(${n})`,
};

export function formatValue(v: Value): string {
    if (isCorrupt(v)) {
        return `<corrupt:${formatBits(v)}>`;
    }
    return apply(v, formatter);
}
