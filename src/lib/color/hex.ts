/**
 * Hex color parsing for proof requests
 */

import { ProofError } from "../../errors.js";
import { capItems, type Capped } from "../capped.js";

export interface RGB {
    r: number;
    g: number;
    b: number;
}

/**
 * Normalizes "#abc", "abc", "#aabbcc" or "aabbcc" to six lowercase digits.
 * Throws invalid_input naming the offending value otherwise.
 */
function normalizeHexDigits(hex: string | null | undefined): string {
    let digits = (hex ?? "").trim().replace(/^#+/, "");
    if (digits.length === 3) {
        digits = digits
            .split("")
            .map((c) => c + c)
            .join("");
    }
    if (!/^[0-9a-fA-F]{6}$/.test(digits)) {
        throw new ProofError("invalid_input", `Invalid color: ${hex ?? ""}`);
    }
    return digits.toLowerCase();
}

export function hexToRgb(hex: string | null | undefined): RGB {
    const digits = normalizeHexDigits(hex);
    return {
        r: parseInt(digits.substring(0, 2), 16),
        g: parseInt(digits.substring(2, 4), 16),
        b: parseInt(digits.substring(4, 6), 16),
    };
}

/**
 * @returns 0xRRGGBB
 */
export function hexToRgbInt(hex: string | null | undefined): number {
    return parseInt(normalizeHexDigits(hex), 16);
}

export function rgbIntToHex(value: number): string {
    return `#${(value & 0xffffff).toString(16).padStart(6, "0")}`;
}

/**
 * Canonical "#rrggbb" form of any accepted hex input
 */
export function normalizeHex(hex: string): string {
    return `#${normalizeHexDigits(hex)}`;
}

/**
 * Splits a comma-separated color list, keeping at most maxColors entries.
 * Entries past the cap are dropped without validation.
 */
export function parseColorList(colorsCsv: string | null | undefined, maxColors: number): Capped<string> {
    const entries = (colorsCsv ?? "")
        .split(",")
        .map((c) => c.trim())
        .filter((c) => c.length > 0);

    if (entries.length === 0) {
        throw new ProofError("invalid_input", "No colors provided.");
    }

    const capped = capItems(entries, maxColors);
    for (const color of capped.items) {
        hexToRgbInt(color);
    }
    return capped;
}
