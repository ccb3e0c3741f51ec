/**
 * Shared Configuration Constants
 *
 * Centralized defaults for the provisioning engine.
 * Values can be overridden via environment variables.
 */

/**
 * Parse an integer millisecond value, falling back when unset, malformed
 * or beyond Number.MAX_SAFE_INTEGER.
 * Negative and zero values are kept: callers treat them as "no deadline".
 */
export function parseDuration(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    if (!/^-?\d+$/.test(raw.trim())) return fallback;
    const value = parseInt(raw.trim(), 10);
    return Number.isSafeInteger(value) ? value : fallback;
}

// How long to wait for the provider to come online; <= 0 waits forever
export const DEFAULT_ONLINE_TIMEOUT_MS = parseDuration(process.env.FIRSTBOOT_ONLINE_TIMEOUT_MS, 60_000);

// Where a fetched config is cached between stages of the same boot
export const DEFAULT_CONFIG_CACHE_PATH = process.env.FIRSTBOOT_CONFIG_CACHE || '/run/firstboot.json';

// Filesystem root handed to stages
export const DEFAULT_ROOT = process.env.FIRSTBOOT_ROOT || '/sysroot';

// rw-r----- : owner and group only
export const CACHE_FILE_MODE = 0o640;

export interface EngineSettings {
    configCache: string;
    onlineTimeoutMs: number;
    root: string;
}

export function resolveEngineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
    return {
        configCache: overrides.configCache ?? DEFAULT_CONFIG_CACHE_PATH,
        onlineTimeoutMs: overrides.onlineTimeoutMs ?? DEFAULT_ONLINE_TIMEOUT_MS,
        root: overrides.root ?? DEFAULT_ROOT,
    };
}
