// src/config_cache.ts

import * as fs from "fs";
import { Config, deserializeConfig, serializeConfig } from "./config_document";
import { ErrorFactory } from "./engine_error";
import { CACHE_FILE_MODE } from "./settings";

/**
 * Single-file cache of the config fetched earlier in the same boot.
 *
 * read():  CACHE_MISS when the file cannot be read, CACHE_CORRUPT when it
 *          can but does not hold a config. Only the first is a fall-through.
 * write(): CACHE_SERIALIZE_FAILED / CACHE_WRITE_FAILED. Plain write, no
 *          temp-then-rename; the mode applies when the file is created.
 *
 * One reader/writer per path per process; no locking.
 */
export class ConfigCache {
    constructor(
        public readonly filePath: string,
        private readonly mode: number = CACHE_FILE_MODE
    ) { }

    read(): Config {
        let text: string;
        try {
            text = fs.readFileSync(this.filePath, "utf8");
        } catch (e) {
            throw ErrorFactory.cacheMiss(this.filePath, e);
        }
        return deserializeConfig(text);
    }

    write(cfg: Config): void {
        const body = serializeConfig(cfg);
        try {
            fs.writeFileSync(this.filePath, body, { mode: this.mode });
        } catch (e) {
            throw ErrorFactory.cacheWriteFailed(this.filePath, e);
        }
    }
}
