/* Provisioning Engine — acquire a config, then dispatch it to one stage.
 *
 * Acquisition order:
 *   1. Config cache (hit → done, provider untouched)
 *   2. Cache unreadable → wait for provider readiness, fetch once
 *   3. Re-cache the fetched config
 *
 * Outcome classification at run():
 *   - config in hand        → run the named stage, return its result
 *   - ignorable CONFIG_*    → info, return true
 *   - anything else         → crit, return false
 */

import * as crypto from "crypto";
import { ConfigCache } from "./config_cache";
import { Config } from "./config_document";
import { classifyFailure, describeError, ErrorFactory, isEngineError } from "./engine_error";
import { clearCorrelation, Logger, setCorrelation } from "./logger";
import { Provider } from "./provider";
import { fetchConfig } from "./readiness_waiter";
import { resolveEngineSettings } from "./settings";
import { StageRegistry, stages as defaultStages } from "./stage_registry";

export interface EngineOptions {
    provider: Provider;
    logger: Logger;
    configCache?: string;
    /** <= 0 waits for the provider indefinitely. */
    onlineTimeoutMs?: number;
    /** Filesystem root handed to the stage. */
    root?: string;
    stages?: StageRegistry;
}

export class Engine {
    readonly configCache: string;
    readonly onlineTimeoutMs: number;
    readonly root: string;
    private readonly provider: Provider;
    private readonly logger: Logger;
    private readonly stages: StageRegistry;
    private readonly cache: ConfigCache;

    constructor(options: EngineOptions) {
        const settings = resolveEngineSettings({
            configCache: options.configCache,
            onlineTimeoutMs: options.onlineTimeoutMs,
            root: options.root,
        });
        this.configCache = settings.configCache;
        this.onlineTimeoutMs = settings.onlineTimeoutMs;
        this.root = settings.root;
        this.provider = options.provider;
        this.logger = options.logger;
        this.stages = options.stages ?? defaultStages;
        this.cache = new ConfigCache(this.configCache);
    }

    /**
     * Run the stage named `stageName`. Resolves true when the stage succeeded
     * or there was deliberately nothing to do, false on any failure.
     */
    async run(stageName: string): Promise<boolean> {
        setCorrelation({ runId: crypto.randomUUID(), stage: stageName });
        try {
            let cfg: Config;
            try {
                cfg = await this.acquireConfig();
            } catch (e) {
                if (classifyFailure(e) === "ignorable") {
                    this.logger.info(`${describeError(e)}: ignoring and exiting...`);
                    return true;
                }
                this.logger.crit(`failed to acquire config: ${describeError(e)}`);
                return false;
            }

            return await this.dispatch(stageName, cfg);
        } finally {
            clearCorrelation();
        }
    }

    private async dispatch(stageName: string, cfg: Config): Promise<boolean> {
        const creator = this.stages.get(stageName);
        if (!creator) {
            const err = ErrorFactory.unknownStage(stageName, this.stages.names());
            this.logger.crit(err.message, err.context);
            return false;
        }

        this.logger.pushPrefix(stageName);
        try {
            return await creator.create(this.logger, this.root).run(cfg);
        } catch (e) {
            this.logger.crit(`stage failed: ${describeError(e)}`);
            return false;
        } finally {
            this.logger.popPrefix();
        }
    }

    /**
     * Return the config, preferring the local cache over the provider.
     * A corrupt cache is fatal; it does not fall through to a fetch.
     * A cache write failure after a successful fetch is surfaced as well,
     * so the run fails and the next boot refetches.
     *
     * Failures are logged at debug here; run() reports the one crit line.
     */
    async acquireConfig(): Promise<Config> {
        try {
            const cached = this.cache.read();
            this.logger.debug(`using cached config from ${this.configCache}`);
            return cached;
        } catch (e) {
            if (!isEngineError(e) || e.code !== "CACHE_MISS") {
                this.logger.debug(`failed to parse cached config: ${describeError(e)}`);
                throw e;
            }
            this.logger.debug(`no usable config cache: ${e.message}`);
        }

        let cfg: Config;
        try {
            cfg = await fetchConfig(this.provider, this.onlineTimeoutMs, this.logger);
        } catch (e) {
            this.logger.debug(`failed to fetch config: ${describeError(e)}`);
            throw e;
        }
        this.logger.debug("fetched config", { config: cfg });

        try {
            this.cache.write(cfg);
        } catch (e) {
            const what = isEngineError(e) && e.code === "CACHE_SERIALIZE_FAILED" ? "marshal" : "write";
            this.logger.debug(`failed to ${what} cached config: ${describeError(e)}`);
            throw e;
        }

        return cfg;
    }
}
