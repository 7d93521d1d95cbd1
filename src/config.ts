/**
 * Process configuration
 * Built once at start-up and passed to every component.
 */

import { mkdirSync } from "fs";
import { join, resolve } from "path";
import { z } from "zod";

export interface ProofConfig {
    baseDir: string;
    dataDir: string;
    masterDir: string;
    generatedDir: string;
    backupDir: string;
    dbPath: string;
    logCsvPath: string;
    designMapPath: string;
    adminPassword: string;
    mirrorBackupDir: string | null;
    jumpThreshold: number;
    maxBlocks: number;
    canvasSize: number;
    padding: number;
    lineWidth: number;
    watermarkHeight: number;
    watermarkText: string;
    proofIdPrefix: string;
    httpPort: number;
}

const blankToUndefined = (value: unknown) =>
    typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
    PROOF_DATA_DIR: z.preprocess(blankToUndefined, z.string().trim().optional()),
    PROOF_ADMIN_PASSWORD: z.preprocess(blankToUndefined, z.string().optional().default("change-this-now")),
    PROOF_MIRROR_BACKUP_DIR: z.preprocess(blankToUndefined, z.string().trim().optional()),
    PROOF_JUMP_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().positive().optional().default(45)),
    PROOF_HTTP_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).optional().default(3001)),
});

/**
 * Reads configuration from environment variables
 * @param env - Environment to read (defaults to process.env)
 * @param baseDir - Directory holding designs/master and design_map.json
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, baseDir: string = process.cwd()): ProofConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid configuration: ${issue?.path.join(".") ?? "env"} ${issue?.message ?? ""}`.trim());
    }

    const vars = parsed.data;
    const base = resolve(baseDir);
    const dataDir = vars.PROOF_DATA_DIR ? resolve(vars.PROOF_DATA_DIR) : base;

    return Object.freeze({
        baseDir: base,
        dataDir,
        masterDir: join(base, "designs", "master"),
        generatedDir: join(dataDir, "designs", "generated"),
        backupDir: join(dataDir, "backups"),
        dbPath: join(dataDir, "proofs.db"),
        logCsvPath: join(dataDir, "proofs_log.csv"),
        designMapPath: join(base, "design_map.json"),
        adminPassword: vars.PROOF_ADMIN_PASSWORD,
        mirrorBackupDir: vars.PROOF_MIRROR_BACKUP_DIR ? resolve(vars.PROOF_MIRROR_BACKUP_DIR) : null,
        jumpThreshold: vars.PROOF_JUMP_THRESHOLD,
        maxBlocks: 20,
        canvasSize: 900,
        padding: 40,
        lineWidth: 2,
        watermarkHeight: 26,
        watermarkText: "stitchproof proof (preview only)",
        proofIdPrefix: "JNB",
        httpPort: vars.PROOF_HTTP_PORT,
    });
}

/**
 * Creates the directories the service reads from and writes to
 */
export function ensureDirectories(config: ProofConfig): void {
    const dirs = [config.masterDir, config.generatedDir, config.backupDir];
    if (config.mirrorBackupDir) {
        dirs.push(config.mirrorBackupDir);
    }
    for (const dir of dirs) {
        mkdirSync(dir, { recursive: true });
    }
}
