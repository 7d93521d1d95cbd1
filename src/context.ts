/**
 * Per-process wiring shared by the MCP and HTTP surfaces
 */

import { ensureDirectories, type ProofConfig } from "./config.js";
import { DesignLibrary } from "./designs.js";
import { defaultFormats, type FormatRegistry } from "./formats/registry.js";
import { ProofStore } from "./store/proofStore.js";

export interface ProofContext {
    config: ProofConfig;
    formats: FormatRegistry;
    designs: DesignLibrary;
    store: ProofStore;
    now: () => Date;
}

export interface ContextOptions {
    formats?: FormatRegistry;
    now?: () => Date;
}

export function createContext(config: ProofConfig, options: ContextOptions = {}): ProofContext {
    ensureDirectories(config);
    const formats = options.formats ?? defaultFormats();
    return {
        config,
        formats,
        designs: new DesignLibrary(config, formats),
        store: new ProofStore(config.dbPath),
        now: options.now ?? (() => new Date()),
    };
}
