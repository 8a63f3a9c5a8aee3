import { InvalidNumericFieldError } from './errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a scalar from a decoded JSON object. Empty strings and zero count as
 * absent, the same way legacy producers write "no value".
 */
export function field(
    data: Record<string, unknown>,
    key: string
): string | undefined {
    const value = data[key];
    if (typeof value === 'string') {
        return value === '' ? undefined : value;
    }
    if (typeof value === 'number' && value !== 0 && Number.isFinite(value)) {
        return String(value);
    }
}

export function param(
    query: URLSearchParams,
    key: string
): string | undefined {
    const value = query.get(key);
    return value ? value : undefined;
}

export function toInteger(name: string, raw: string): number {
    if (!/^\s*-?\d+\s*$/.test(raw)) {
        throw new InvalidNumericFieldError(name, raw);
    }
    const n = Number(raw.trim());
    if (!Number.isSafeInteger(n)) {
        throw new InvalidNumericFieldError(name, raw);
    }
    return n;
}

export function toPort(raw: string | number, name = 'port'): number {
    const port = typeof raw === 'number' ? raw : toInteger(name, raw);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new InvalidNumericFieldError(name, raw);
    }
    return port;
}

export function splitList(value?: string): string[] {
    return (value || '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => !!item);
}
