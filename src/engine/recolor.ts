/**
 * Thread list helpers and the recolor writer
 */

import { writeFileSync } from "fs";
import { extname, basename, join } from "path";
import { ProofError } from "../errors.js";
import { hexToRgbInt, rgbIntToHex } from "../lib/color/hex.js";
import type { EmbroideryPattern, FormatAdapter } from "./pattern.js";

/**
 * The design's own thread colors as "#rrggbb", first maxColors only
 */
export function threadHexColors(pattern: EmbroideryPattern, maxColors: number): string[] {
    return pattern.threads.slice(0, maxColors).map((thread) => rgbIntToHex(thread.rgb));
}

/**
 * Overwrites thread colors in place for indices 0..min(threads, colors)-1.
 * Threads past the supplied colors keep their original color.
 * @returns number of threads changed
 */
export function applyThreadColors(pattern: EmbroideryPattern, colors: readonly string[]): number {
    if (pattern.threads.length === 0) {
        throw new ProofError("unprocessable", "Master design has no thread list.");
    }

    // Parse everything before touching the pattern
    const values = colors.map((c) => hexToRgbInt(c));
    const n = Math.min(pattern.threads.length, values.length);
    for (let i = 0; i < n; i++) {
        pattern.threads[i].rgb = values[i];
    }
    return n;
}

export interface RecolorRequest {
    pattern: EmbroideryPattern;
    format: FormatAdapter;
    designFile: string;
    clientTag: string;
    proofId: string;
    colors: readonly string[];
    outputDir: string;
}

/**
 * Name of a generated design: <base>__<tag>__<proofId><ext>
 */
export function generatedFileName(designFile: string, clientTag: string, proofId: string): string {
    const ext = extname(designFile);
    const base = basename(designFile, ext);
    return `${base}__${clientTag}__${proofId}${ext}`;
}

/**
 * Recolors the decoded master pattern and writes it as a new design file
 * @returns path of the written file
 */
export function writeRecoloredDesign(request: RecolorRequest): string {
    const { pattern, format, designFile, clientTag, proofId, colors, outputDir } = request;

    applyThreadColors(pattern, colors);

    const outPath = join(outputDir, generatedFileName(designFile, clientTag, proofId));
    writeFileSync(outPath, format.encode(pattern));
    return outPath;
}
