/**
 * Master design library and slug links (design_map.json)
 */

import { existsSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { ProofConfig } from "./config.js";
import { ProofError } from "./errors.js";
import type { EmbroideryPattern } from "./engine/pattern.js";
import type { FormatRegistry } from "./formats/registry.js";

const designMapSchema = z.record(z.string(), z.string());

export type DesignMap = z.infer<typeof designMapSchema>;

export class DesignLibrary {
    constructor(
        private readonly config: ProofConfig,
        private readonly formats: FormatRegistry
    ) {}

    /**
     * Sorted master file names with a registered format
     */
    list(): string[] {
        if (!existsSync(this.config.masterDir)) {
            return [];
        }
        return readdirSync(this.config.masterDir)
            .filter((name) => this.formats.supports(name))
            .sort();
    }

    /**
     * Path of a listed master file; names outside the listing are not_found
     */
    resolve(designFile: string): string {
        if (!this.list().includes(designFile)) {
            throw new ProofError("not_found", "Design file not found in designs/master.");
        }
        return join(this.config.masterDir, designFile);
    }

    /**
     * Decodes a master file. Every call returns an independent pattern.
     */
    load(designFile: string): EmbroideryPattern {
        const path = this.resolve(designFile);
        return this.formats.forFile(designFile).decode(readFileSync(path));
    }

    loadDesignMap(): DesignMap {
        if (!existsSync(this.config.designMapPath)) {
            return {};
        }
        try {
            const parsed = designMapSchema.safeParse(JSON.parse(readFileSync(this.config.designMapPath, "utf-8")));
            if (parsed.success) {
                return parsed.data;
            }
            console.error("[designs] design_map.json is not a slug -> file object; ignoring it");
        } catch (error) {
            console.error("[designs] Failed to read design_map.json:", error);
        }
        return {};
    }

    /**
     * Design file behind a slug link
     */
    resolveSlug(slug: string): string {
        const mapping = this.loadDesignMap();
        if (!Object.prototype.hasOwnProperty.call(mapping, slug)) {
            throw new ProofError("not_found", "Unknown design link.");
        }
        const designFile = mapping[slug];
        this.resolve(designFile);
        return designFile;
    }
}
