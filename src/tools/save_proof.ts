/**
 * Save a proof: recolored design file + database record + audit trail
 */

import type { ProofContext } from "../context.js";
import { hexToRgbInt, parseColorList } from "../lib/color/hex.js";
import { newProofId, safeTag } from "../lib/ids.js";
import { writeRecoloredDesign } from "../engine/recolor.js";
import { appendCsvLog, mirrorFile, writeJsonSnapshot, type MirrorOutcome } from "../store/auditLog.js";
import type { ProofRecord } from "../store/proofStore.js";
import type { ToolDefinition } from "./types.js";

export interface SaveProofInput {
    designFile: string;
    clientTag: string;
    bgHex: string;
    colorsCsv: string;
}

export interface SaveProofOutput {
    proofId: string;
    record: ProofRecord;
    snapshotPath: string;
    mirrored: MirrorOutcome[];
}

export function saveProofHandler(ctx: ProofContext, input: SaveProofInput): SaveProofOutput {
    const { config } = ctx;

    ctx.designs.resolve(input.designFile);
    const clientTag = safeTag(input.clientTag);
    hexToRgbInt(input.bgHex);
    const colors = parseColorList(input.colorsCsv, config.maxBlocks).items;

    const proofId = newProofId(config.proofIdPrefix);
    const createdUtc = ctx.now().toISOString();

    const pattern = ctx.designs.load(input.designFile);
    const generatedPath = writeRecoloredDesign({
        pattern,
        format: ctx.formats.forFile(input.designFile),
        designFile: input.designFile,
        clientTag,
        proofId,
        colors,
        outputDir: config.generatedDir,
    });

    const record: ProofRecord = {
        proofId,
        designFile: input.designFile,
        clientTag,
        bgHex: input.bgHex,
        colors,
        createdUtc,
        generatedPath,
    };

    ctx.store.insert(record);
    appendCsvLog(config.logCsvPath, record);
    const snapshotPath = writeJsonSnapshot(config.backupDir, record);

    const mirrored = [config.dbPath, config.logCsvPath, snapshotPath].map((path) =>
        mirrorFile(path, config.mirrorBackupDir)
    );

    console.error(`[proof] saved ${proofId} for ${input.designFile} (${clientTag})`);

    return { proofId, record, snapshotPath, mirrored };
}

export const saveProofTool: ToolDefinition = {
    name: "save_proof",
    description: "Saves a color proof: writes a recolored copy of the design file and logs the proof for audit",
    inputSchema: {
        type: "object",
        properties: {
            design_file: {
                type: "string",
                description: "Master design file name",
            },
            client_tag: {
                type: "string",
                description: "Customer name or tag (sanitized to [a-z0-9_-], max 28 chars)",
            },
            bg_hex: {
                type: "string",
                description: "Background (garment) color, #RRGGBB or #RGB",
            },
            colors_csv: {
                type: "string",
                description: "Comma-separated block colors in block order (up to 20)",
            },
        },
        required: ["design_file", "client_tag", "bg_hex", "colors_csv"],
    },
};
