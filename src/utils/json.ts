export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

export function readRecord(source: unknown, key: string): Record<string, unknown> | null {
    if (!isRecord(source)) return null;
    const value = source[key];
    return isRecord(value) ? value : null;
}

export function readString(source: unknown, key: string): string | null {
    if (!isRecord(source)) return null;
    const value = source[key];
    return typeof value === 'string' ? value : null;
}

export function readNumber(source: unknown, key: string): number | null {
    if (!isRecord(source)) return null;
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readArray(source: unknown, key: string): unknown[] {
    if (!isRecord(source)) return [];
    const value = source[key];
    return Array.isArray(value) ? value : [];
}

/** JSON.parse that reports failure as null instead of throwing. */
export function tryParseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}
