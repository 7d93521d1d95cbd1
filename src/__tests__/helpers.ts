/**
 * Shared fixtures: temp workspaces, stitch builders and a JSON test format
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { z } from "zod";
import { loadConfig, type ProofConfig } from "../config.js";
import { createContext, type ProofContext } from "../context.js";
import type { EmbroideryPattern, FormatAdapter, StitchCommand, StitchRecord } from "../engine/pattern.js";
import { dstFormat } from "../formats/dst.js";
import { FormatRegistry } from "../formats/registry.js";

export const TEST_PASSWORD = "test-secret";

export const s = (x: number, y: number, command: StitchCommand = "stitch"): StitchRecord => ({ x, y, command });
export const cc = (x: number = 0, y: number = 0): StitchRecord => ({ x, y, command: "color_change" });

/**
 * The value a synchronous call throws, or undefined
 */
export function errorOf(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

const patternSchema = z.object({
    label: z.string().optional(),
    stitches: z.array(
        z.object({
            x: z.number(),
            y: z.number(),
            command: z.enum(["stitch", "jump", "trim", "stop", "end", "color_change"]),
        })
    ),
    threads: z.array(
        z.object({
            index: z.number(),
            rgb: z.number(),
            description: z.string().optional(),
            catalogNumber: z.string().optional(),
        })
    ),
});

/**
 * Stand-in codec that stores the pattern as JSON under any extension
 */
export function jsonTestFormat(extension: string): FormatAdapter {
    return {
        extension,
        name: `JSON test format (${extension})`,
        decode: (bytes) => patternSchema.parse(JSON.parse(Buffer.from(bytes).toString("utf-8"))),
        encode: (pattern) => Buffer.from(JSON.stringify(pattern), "utf-8"),
    };
}

/**
 * Two color blocks, three threads
 */
export function twoBlockPattern(): EmbroideryPattern {
    return {
        label: "sample",
        stitches: [
            s(0, 0),
            s(10, 0),
            s(20, 0),
            cc(20, 0),
            s(0, 40),
            s(0, 50),
            s(0, 50, "end"),
        ],
        threads: [
            { index: 0, rgb: 0x112233 },
            { index: 1, rgb: 0x445566 },
            { index: 2, rgb: 0x778899 },
        ],
    };
}

export interface Workspace {
    baseDir: string;
    config: ProofConfig;
    ctx: ProofContext;
    addDesign(name: string, pattern: EmbroideryPattern): void;
    cleanup(): void;
}

export function createWorkspace(env: NodeJS.ProcessEnv = {}): Workspace {
    const baseDir = mkdtempSync(join(tmpdir(), "stitchproof-"));
    const config = loadConfig({ PROOF_ADMIN_PASSWORD: TEST_PASSWORD, ...env }, baseDir);
    const formats = new FormatRegistry([dstFormat, jsonTestFormat(".pes")]);
    const ctx = createContext(config, {
        formats,
        now: () => new Date("2026-03-01T12:00:00.000Z"),
    });

    return {
        baseDir,
        config,
        ctx,
        addDesign(name, pattern) {
            mkdirSync(config.masterDir, { recursive: true });
            writeFileSync(join(config.masterDir, name), formats.forFile(name).encode(pattern));
        },
        cleanup() {
            ctx.store.close();
            rmSync(baseDir, { recursive: true, force: true });
        },
    };
}
