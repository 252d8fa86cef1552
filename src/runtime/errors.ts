/*
 * Tagged Value Runtime - Errors
 */

export function formatBits(bits: bigint): string {
    return '0x' + bits.toString(16).padStart(16, '0');
}

/**
 * Raised by a kind-specific accessor when assertions are enabled and the
 * cell holds a different kind.
 */
export class ValueContractError extends Error {
    readonly expected: string;
    readonly bits: bigint;

    constructor(expected: string, bits: bigint) {
        super(`Value contract violated: expected ${expected}, got ${formatBits(bits)}`);
        this.name = 'ValueContractError';
        this.expected = expected;
        this.bits = bits;
    }
}

/**
 * Raised for input that has no encoding: reference handles outside
 * 48 bits and raw words outside 64 bits.
 */
export class ValueRangeError extends RangeError {
    constructor(message: string) {
        super(message);
        this.name = 'ValueRangeError';
    }
}
