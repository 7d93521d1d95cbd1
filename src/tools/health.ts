/**
 * Health check tool - Returns server status and storage summary
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import type { ProofContext } from "../context.js";
import type { ToolDefinition } from "./types.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    formats: string[];
    designs: number;
    mirrorEnabled: boolean;
}

// Track server start time
const startTime = Date.now();

/**
 * Get version from environment variable or package.json
 */
function getVersion(): string {
    if (process.env.VERSION) {
        return process.env.VERSION;
    }

    try {
        const packagePath = resolve(process.cwd(), "package.json");
        const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
        if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
            return String(packageJson.version);
        }
    } catch (error) {
        console.error("[health] package.json not readable:", error instanceof Error ? error.message : error);
    }
    return "unknown";
}

export function healthHandler(ctx: ProofContext, toolCount: number): HealthOutput {
    return {
        ok: true,
        version: getVersion(),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        formats: ctx.formats.extensions,
        designs: ctx.designs.list().length,
        mirrorEnabled: ctx.config.mirrorBackupDir !== null,
    };
}

export const healthTool: ToolDefinition = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count, supported formats and design count. Only registered formats are counted (Tajima .dst by default); DST masters without TC: thread-color lines cannot be saved as proofs.",
    inputSchema: {
        type: "object",
        properties: {},
    },
};
