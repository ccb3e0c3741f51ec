/**
 * Config document value type and the byte-level checks providers apply
 * before handing a document to the engine. The document schema itself is
 * owned elsewhere; here a config is any JSON object.
 */

import { ErrorFactory, describeError } from './engine_error';

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type Config = { [key: string]: JsonValue };

export function isConfig(value: unknown): value is Config {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const CLOUD_CONFIG_HEADER = '#cloud-config';
const SCRIPT_HEADER = '#!';

/* -------------------------------------------------------------------------- */
/* Cache (de)serialization                                                    */
/* -------------------------------------------------------------------------- */

// JSON.stringify would write NaN and ±Infinity as null
function rejectNonFinite(key: string, value: unknown): unknown {
    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new Error(`unsupported value ${value} at key "${key}"`);
    }
    return value;
}

export function serializeConfig(cfg: Config): string {
    try {
        return JSON.stringify(cfg, rejectNonFinite);
    } catch (err) {
        throw ErrorFactory.cacheSerializeFailed(err);
    }
}

export function deserializeConfig(text: string): Config {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw ErrorFactory.cacheCorrupt(describeError(err), err);
    }
    if (!isConfig(parsed)) {
        throw ErrorFactory.cacheCorrupt(`expected a JSON object, got ${describeKind(parsed)}`);
    }
    return parsed;
}

/* -------------------------------------------------------------------------- */
/* Provider-side parsing                                                      */
/* -------------------------------------------------------------------------- */

/**
 * Parse raw userdata into a Config. Empty input, cloud-config documents and
 * scripts are rejected with the ignorable CONFIG_* codes; anything else that
 * is not a JSON object is CONFIG_INVALID.
 */
export function parseConfig(raw: Buffer | string): Config {
    const text = typeof raw === 'string' ? raw : raw.toString('utf8');
    const trimmed = text.trim();

    if (trimmed.length === 0) {
        throw ErrorFactory.configEmpty();
    }

    const header = trimmed.split(/\r?\n/, 1)[0].trimEnd();
    if (header.startsWith(CLOUD_CONFIG_HEADER)) {
        throw ErrorFactory.configCloudConfig();
    }
    if (header.startsWith(SCRIPT_HEADER)) {
        throw ErrorFactory.configScript();
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(trimmed);
    } catch (err) {
        throw ErrorFactory.configInvalid(describeError(err), err);
    }
    if (!isConfig(parsed)) {
        throw ErrorFactory.configInvalid(`expected a JSON object, got ${describeKind(parsed)}`);
    }
    return parsed;
}

function describeKind(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}
