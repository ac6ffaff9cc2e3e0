/**
 * Shared utilities for source adapters.
 *
 * Service responses arrive as `unknown`; these helpers walk them without
 * trusting their shape, so a malformed body reads as "nothing there".
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow a path of object keys. Returns undefined as soon as a step is
 * missing or not an object.
 */
export function getPath(value: unknown, ...path: string[]): unknown {
    let current = value;
    for (const key of path) {
        if (!isJsonObject(current)) return undefined;
        current = current[key];
    }
    return current;
}

/**
 * Array at `value`, or an empty array for anything else.
 */
export function asArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

/**
 * Non-empty string field of an object, or null.
 */
export function stringField(value: unknown, field: string): string | null {
    const candidate = getPath(value, field);
    return typeof candidate === 'string' && candidate.trim() ? candidate.trim() : null;
}

/**
 * Message of an unknown thrown value, for logging.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
