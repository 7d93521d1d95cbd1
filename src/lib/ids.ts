/**
 * Proof identifiers and client tags
 */

import { randomUUID } from "crypto";

/**
 * Reduces free text to [a-z0-9_-], falling back to "client" when nothing is left
 */
export function safeTag(text: string | null | undefined, maxLen: number = 28): string {
    const cleaned = (text ?? "")
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9_-]+/g, "_")
        .replace(/_+/g, "_")
        .replace(/^_+|_+$/g, "");
    return (cleaned || "client").slice(0, maxLen);
}

/**
 * Random identifier such as "JNB-1A2B3C4D"; never derived from content
 */
export function newProofId(prefix: string = "JNB"): string {
    return `${prefix}-${randomUUID().replace(/-/g, "").slice(0, 8).toUpperCase()}`;
}

/**
 * Local timestamp used in backup file names (yyyymmdd_hhmmss)
 */
export function fileStamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, "0");
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}
