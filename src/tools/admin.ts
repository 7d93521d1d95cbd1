/**
 * Password-gated proof history: listing, downloads and backup bundles
 */

import { createHash, timingSafeEqual } from "crypto";
import { existsSync, readFileSync } from "fs";
import { basename } from "path";
import type { ProofContext } from "../context.js";
import { ProofError } from "../errors.js";
import { buildBackupBundle, type BackupBundle } from "../store/backup.js";
import type { ProofRecord } from "../store/proofStore.js";
import type { ToolDefinition } from "./types.js";

export function requireAdmin(ctx: ProofContext, password: string | null | undefined): void {
    const digest = (s: string) => createHash("sha256").update(s).digest();
    if (!timingSafeEqual(digest(password ?? ""), digest(ctx.config.adminPassword))) {
        throw new ProofError("unauthorized", "Unauthorized");
    }
}

export interface ListProofsInput {
    pw: string;
    limit?: number;
}

export interface ListProofsOutput {
    proofs: ProofRecord[];
    mirrorBackupDir: string | null;
}

export function listProofsHandler(ctx: ProofContext, input: ListProofsInput): ListProofsOutput {
    requireAdmin(ctx, input.pw);
    return {
        proofs: ctx.store.listRecent(input.limit ?? 200),
        mirrorBackupDir: ctx.config.mirrorBackupDir,
    };
}

export interface DownloadProofInput {
    pw: string;
    proofId: string;
}

export interface DownloadProofOutput {
    filename: string;
    data: Buffer;
}

export function downloadProofHandler(ctx: ProofContext, input: DownloadProofInput): DownloadProofOutput {
    requireAdmin(ctx, input.pw);
    const record = ctx.store.get(input.proofId);
    if (!record) {
        throw new ProofError("not_found", "Proof not found.");
    }
    if (!existsSync(record.generatedPath)) {
        throw new ProofError("not_found", "Generated file missing.");
    }
    return {
        filename: basename(record.generatedPath),
        data: readFileSync(record.generatedPath),
    };
}

export interface BackupBundleInput {
    pw: string;
}

export async function backupBundleHandler(ctx: ProofContext, input: BackupBundleInput): Promise<BackupBundle> {
    requireAdmin(ctx, input.pw);
    return await buildBackupBundle(ctx.config, ctx.formats.extensions, ctx.now());
}

const pwProperty = {
    type: "string",
    description: "Admin password",
};

export const listProofsTool: ToolDefinition = {
    name: "list_proofs",
    description: "Lists recent saved proofs, newest first (admin)",
    inputSchema: {
        type: "object",
        properties: {
            pw: pwProperty,
            limit: {
                type: "number",
                description: "Maximum number of proofs (default: 200)",
                default: 200,
            },
        },
        required: ["pw"],
    },
};

export const downloadProofTool: ToolDefinition = {
    name: "download_proof",
    description: "Returns the generated design file of a saved proof as base64 (admin)",
    inputSchema: {
        type: "object",
        properties: {
            pw: pwProperty,
            proof_id: {
                type: "string",
                description: "Proof identifier (e.g., JNB-1A2B3C4D)",
            },
        },
        required: ["pw", "proof_id"],
    },
};

export const backupBundleTool: ToolDefinition = {
    name: "backup_bundle",
    description: "Builds a zip of the proof database, audit log, JSON snapshots, generated files and design map (admin)",
    inputSchema: {
        type: "object",
        properties: {
            pw: pwProperty,
        },
        required: ["pw"],
    },
};
