/*
 * Tagged Value Runtime - Configuration
 *
 * Process-wide switches for contract checking and diagnostics.
 * Assertions are off by default: kind-specific accessors then decode
 * whatever bits they are given without looking at the tag.
 */

/**
 * Configuration for the value runtime.
 */
export interface RuntimeConfig {
    debug?: boolean;                // Emit diagnostics through `log`
    assertions?: boolean;           // Check kind-specific accessors
    log?: (msg: string) => void;    // Diagnostic sink
}

const DEFAULT_CONFIG: Required<RuntimeConfig> = {
    debug: false,
    assertions: process.env.VALUE_ASSERTIONS === '1',
    log: (msg: string) => console.error(msg),
};

let current: Required<RuntimeConfig> = { ...DEFAULT_CONFIG };

/**
 * Merge the given settings over the current configuration.
 */
export function configureRuntime(config: RuntimeConfig): void {
    current = {
        ...current,
        ...config
    };
}

export function getRuntimeConfig(): Readonly<Required<RuntimeConfig>> {
    return current;
}

export function resetRuntimeConfig(): void {
    current = { ...DEFAULT_CONFIG };
}

export function assertionsEnabled(): boolean {
    return current.assertions;
}

/**
 * Write a diagnostic when debug output is enabled.
 */
export function debugLog(msg: string): void {
    if (current.debug) {
        current.log(`[value] ${msg}`);
    }
}
