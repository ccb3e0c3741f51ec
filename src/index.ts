/**
 * Main entry point - exports all public APIs
 */

export { Engine } from './engine';
export type { EngineOptions } from './engine';
export { ConfigCache } from './config_cache';
export { isConfig, parseConfig, serializeConfig, deserializeConfig } from './config_document';
export type { Config, JsonValue } from './config_document';
export {
    EngineError,
    ErrorFactory,
    classifyCode,
    classifyFailure,
    describeError,
    isEngineError
} from './engine_error';
export type { EngineErrorCode, FailureClass } from './engine_error';
export { createLogger, formatLine, setCorrelation, clearCorrelation } from './logger';
export type { Logger, LogLevel, LogRecord } from './logger';
export type { Provider } from './provider';
export { waitForProvider, fetchConfig } from './readiness_waiter';
export {
    resolveEngineSettings,
    parseDuration,
    DEFAULT_ONLINE_TIMEOUT_MS,
    DEFAULT_CONFIG_CACHE_PATH,
    DEFAULT_ROOT,
    CACHE_FILE_MODE
} from './settings';
export type { EngineSettings } from './settings';
export { StageRegistry, stages, registerStage, getStage } from './stage_registry';
export type { Stage, StageCreator } from './stage_registry';
