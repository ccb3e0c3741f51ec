/**
 * Stage contract and the name → creator registry the engine dispatches
 * through. Concrete stages register themselves at load time.
 */

import { Config } from './config_document';
import { Logger } from './logger';

export interface Stage {
    readonly name: string;
    /** Apply `config` to the host. Resolves false on failure. */
    run(config: Config): Promise<boolean>;
}

export interface StageCreator {
    readonly name: string;
    create(logger: Logger, root: string): Stage;
}

export class StageRegistry {
    private creators: Map<string, StageCreator> = new Map();

    register(creator: StageCreator): void {
        if (this.creators.has(creator.name)) {
            throw new Error(`stage "${creator.name}" is already registered`);
        }
        this.creators.set(creator.name, creator);
    }

    get(name: string): StageCreator | undefined {
        return this.creators.get(name);
    }

    names(): string[] {
        return [...this.creators.keys()].sort();
    }
}

// Process-wide registry used when an engine is not given its own
export const stages = new StageRegistry();

export function registerStage(creator: StageCreator): void {
    stages.register(creator);
}

export function getStage(name: string): StageCreator | undefined {
    return stages.get(name);
}
