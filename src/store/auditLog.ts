/**
 * Audit trail: CSV log, per-proof JSON snapshots and optional mirror copies
 */

import { appendFileSync, copyFileSync, existsSync, writeFileSync } from "fs";
import { basename, join } from "path";
import type { ProofRecord } from "./proofStore.js";

export const CSV_HEADER = [
    "created_utc",
    "proof_id",
    "design_file",
    "client_tag",
    "bg_hex",
    "colors_csv",
    "generated_pes_filename",
] as const;

/**
 * One CSV line; quotes fields holding a comma, quote or line break
 */
export function toCsvRow(fields: readonly string[]): string {
    return (
        fields
            .map((field) => (/[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field))
            .join(",") + "\r\n"
    );
}

export function appendCsvLog(csvPath: string, record: ProofRecord): void {
    if (!existsSync(csvPath)) {
        writeFileSync(csvPath, toCsvRow(CSV_HEADER), "utf-8");
    }
    appendFileSync(
        csvPath,
        toCsvRow([
            record.createdUtc,
            record.proofId,
            record.designFile,
            record.clientTag,
            record.bgHex,
            record.colors.join(","),
            basename(record.generatedPath),
        ]),
        "utf-8"
    );
}

export interface ProofSnapshot {
    created_utc: string;
    proof_id: string;
    design_file: string;
    client_tag: string;
    bg_hex: string;
    colors: string[];
    generated_pes_filename: string;
}

/**
 * Writes <backupDir>/<proofId>.json
 * @returns path of the snapshot
 */
export function writeJsonSnapshot(backupDir: string, record: ProofRecord): string {
    const snapshot: ProofSnapshot = {
        created_utc: record.createdUtc,
        proof_id: record.proofId,
        design_file: record.designFile,
        client_tag: record.clientTag,
        bg_hex: record.bgHex,
        colors: record.colors,
        generated_pes_filename: basename(record.generatedPath),
    };
    const snapPath = join(backupDir, `${record.proofId}.json`);
    writeFileSync(snapPath, JSON.stringify(snapshot, null, 2), "utf-8");
    return snapPath;
}

export type MirrorOutcome =
    | { path: string; status: "copied"; target: string }
    | { path: string; status: "disabled" }
    | { path: string; status: "failed"; error: string };

/**
 * Best-effort copy into the mirror directory. Failures are reported in the
 * outcome and logged, never thrown.
 */
export function mirrorFile(path: string, mirrorDir: string | null): MirrorOutcome {
    if (!mirrorDir) {
        return { path, status: "disabled" };
    }
    const target = join(mirrorDir, basename(path));
    try {
        copyFileSync(path, target);
        return { path, status: "copied", target };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error("[proof] mirror copy failed:", path, message);
        return { path, status: "failed", error: message };
    }
}
