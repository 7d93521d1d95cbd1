/**
 * Zip bundle of everything needed to restore the proof history
 */

import archiver from "archiver";
import { existsSync, readdirSync, statSync } from "fs";
import { extname, join } from "path";
import type { ProofConfig } from "../config.js";
import { fileStamp } from "../lib/ids.js";

export interface BackupBundle {
    filename: string;
    entries: string[];
    data: Buffer;
}

interface BundleEntry {
    source: string;
    name: string;
}

function listFiles(dir: string, accept: (name: string) => boolean): string[] {
    if (!existsSync(dir)) {
        return [];
    }
    return readdirSync(dir)
        .filter((name) => accept(name) && statSync(join(dir, name)).isFile())
        .sort();
}

/**
 * Collects the files a backup contains, in archive order
 * @param generatedExtensions - lowercase extensions (".dst") of generated designs to include
 */
export function collectBackupEntries(config: ProofConfig, generatedExtensions: readonly string[]): BundleEntry[] {
    const entries: BundleEntry[] = [];

    if (existsSync(config.dbPath)) {
        entries.push({ source: config.dbPath, name: "proofs.db" });
    }
    if (existsSync(config.logCsvPath)) {
        entries.push({ source: config.logCsvPath, name: "proofs_log.csv" });
    }
    for (const name of listFiles(config.backupDir, (n) => n.toLowerCase().endsWith(".json"))) {
        entries.push({ source: join(config.backupDir, name), name: `backups/${name}` });
    }
    for (const name of listFiles(config.generatedDir, (n) => generatedExtensions.includes(extname(n).toLowerCase()))) {
        entries.push({ source: join(config.generatedDir, name), name: `generated/${name}` });
    }
    if (existsSync(config.designMapPath)) {
        entries.push({ source: config.designMapPath, name: "design_map.json" });
    }

    return entries;
}

export async function buildBackupBundle(
    config: ProofConfig,
    generatedExtensions: readonly string[],
    now: Date = new Date()
): Promise<BackupBundle> {
    const entries = collectBackupEntries(config, generatedExtensions);
    const archive = archiver("zip", { zlib: { level: 9 } });
    const chunks: Buffer[] = [];

    const done = new Promise<Buffer>((resolve, reject) => {
        archive.on("data", (chunk: Buffer) => chunks.push(chunk));
        archive.on("end", () => resolve(Buffer.concat(chunks)));
        archive.on("error", reject);
    });

    for (const entry of entries) {
        archive.file(entry.source, { name: entry.name });
    }
    const [, data] = await Promise.all([archive.finalize(), done]);

    return {
        filename: `BACKUP_${fileStamp(now)}.zip`,
        entries: entries.map((e) => e.name),
        data,
    };
}
