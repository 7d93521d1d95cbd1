/**
 * Format adapters keyed by file extension
 */

import { extname } from "path";
import { ProofError } from "../errors.js";
import type { FormatAdapter } from "../engine/pattern.js";
import { dstFormat } from "./dst.js";

export class FormatRegistry {
    private adapters = new Map<string, FormatAdapter>();

    constructor(adapters: readonly FormatAdapter[] = []) {
        for (const adapter of adapters) {
            this.register(adapter);
        }
    }

    register(adapter: FormatAdapter): void {
        this.adapters.set(adapter.extension.toLowerCase(), adapter);
    }

    get extensions(): string[] {
        return [...this.adapters.keys()].sort();
    }

    supports(fileName: string): boolean {
        return this.adapters.has(extname(fileName).toLowerCase());
    }

    /**
     * Adapter for a file name; unprocessable when no adapter handles its extension
     */
    forFile(fileName: string): FormatAdapter {
        const adapter = this.adapters.get(extname(fileName).toLowerCase());
        if (!adapter) {
            throw new ProofError("unprocessable", `Unsupported design format: ${fileName}`);
        }
        return adapter;
    }
}

/**
 * Registry with every built-in format
 */
export function defaultFormats(): FormatRegistry {
    return new FormatRegistry([dstFormat]);
}
