/*
 * Tagged Value Runtime - Type Identifiers
 */

/**
 * Built-in type ids. A type cell may carry any 32-bit id; only these
 * have names.
 */
export const TypeId = {
    Invalid: 0,
    Type: 1,
    Null: 2,
    Bool: 3,
    Int: 4,
    UInt: 5,
    Float: 6,
    Double: 7,
} as const;

export type TypeId = number;

/**
 * Type id truthiness: every id except Invalid.
 */
export function typeIdIsValid(id: TypeId): boolean {
    return id !== TypeId.Invalid;
}

export function getTypeName(id: TypeId): string {
    switch (id) {
        case TypeId.Type: return 'type';
        case TypeId.Null: return 'null';
        case TypeId.Bool: return 'bool';
        case TypeId.Int: return 'int';
        case TypeId.UInt: return 'uint';
        case TypeId.Float: return 'float';
        case TypeId.Double: return 'double';
        default: return '(invalid)';
    }
}
