/*
 * Tagged Value Runtime - Value Cell
 *
 * A slot holding one value word, e.g. an entry of a value stack.
 * Every setter replaces the whole word.
 */

import { apply, formatValue, type ValueVisitor } from './dispatch';
import type { TypeId } from './typeId';
import * as values from './values';
import type { Value } from './values';

export class ValueCell {
    private data: Value;

    constructor(data: Value = values.NULL_VALUE) {
        this.data = values.fromBits(data);
    }

    get bits(): Value {
        return this.data;
    }

    // ============ Layout ============

    isShortLayout(): boolean { return values.isShortLayout(this.data); }
    isReferenceLayout(): boolean { return values.isReferenceLayout(this.data); }
    isDoubleLayout(): boolean { return values.isDoubleLayout(this.data); }

    // ============ Kinds ============

    isTypeId(): boolean { return values.isTypeId(this.data); }
    setTypeId(id: TypeId): void { this.data = values.valTypeId(id); }
    getTypeId(): TypeId { return values.asTypeId(this.data); }

    isNull(): boolean { return values.isNull(this.data); }
    setNull(): void { this.data = values.NULL_VALUE; }
    getNull(): null { return values.asNull(this.data); }

    isBool(): boolean { return values.isBool(this.data); }
    setBool(b: boolean): void { this.data = values.valBool(b); }
    getBool(): boolean { return values.asBool(this.data); }
    setTrue(): void { this.data = values.TRUE_VALUE; }
    setFalse(): void { this.data = values.FALSE_VALUE; }
    isTrue(): boolean { return values.isTrue(this.data); }
    isFalse(): boolean { return values.isFalse(this.data); }

    isInt(): boolean { return values.isInt(this.data); }
    setInt(n: number): void { this.data = values.valInt(n); }
    getInt(): number { return values.asInt(this.data); }

    isUInt(): boolean { return values.isUInt(this.data); }
    setUInt(n: number): void { this.data = values.valUInt(n); }
    getUInt(): number { return values.asUInt(this.data); }

    isFloat(): boolean { return values.isFloat(this.data); }
    setFloat(n: number): void { this.data = values.valFloat(n); }
    getFloat(): number { return values.asFloat(this.data); }

    isReference(): boolean { return values.isReference(this.data); }
    setReference(handle: number): void { this.data = values.valReference(handle); }
    getReference(): number { return values.asReference(this.data); }

    isDouble(): boolean { return values.isDouble(this.data); }
    setDouble(n: number): void { this.data = values.valDouble(n); }
    getDouble(): number { return values.asDouble(this.data); }

    // ============ Queries ============

    isNumeric(): boolean { return values.isNumeric(this.data); }
    isValid(): boolean { return values.isValid(this.data); }
    getType(): TypeId { return values.getType(this.data); }

    apply<R>(visitor: ValueVisitor<R>): R {
        return apply(this.data, visitor);
    }

    equals(other: ValueCell): boolean {
        return this.data === other.data;
    }

    clone(): ValueCell {
        return new ValueCell(this.data);
    }

    toString(): string {
        return formatValue(this.data);
    }
}
