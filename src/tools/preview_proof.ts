/**
 * Proof preview: stitch stream -> blocks -> canvas -> PNG
 */

import type { ProofContext } from "../context.js";
import { capItems } from "../lib/capped.js";
import { hexToRgbInt, parseColorList } from "../lib/color/hex.js";
import { extractBlocks } from "../engine/geometry.js";
import { normalizeBlocks } from "../engine/normalize.js";
import type { EmbroideryPattern } from "../engine/pattern.js";
import { threadHexColors } from "../engine/recolor.js";
import { renderPreviewPng } from "../engine/render.js";
import type { ProofConfig } from "../config.js";
import type { ToolDefinition } from "./types.js";

export interface PreviewProofInput {
    design: string;
    bg: string;
    colors: string;
}

export interface PreviewProofOutput {
    png: Buffer;
    blockCount: number;
    droppedBlocks: number;
}

/**
 * Renders a decoded pattern with the given background and block colors
 */
export async function renderPatternPreview(
    pattern: EmbroideryPattern,
    bg: string,
    colors: readonly string[],
    config: ProofConfig
): Promise<PreviewProofOutput> {
    const blocks = capItems(extractBlocks(pattern.stitches, config.jumpThreshold), config.maxBlocks);
    const normalized = normalizeBlocks(blocks.items, { padding: config.padding, canvas: config.canvasSize });

    const png = await renderPreviewPng(normalized.blocks, {
        canvas: normalized.canvas,
        background: bg,
        overrides: colors,
        fallback: threadHexColors(pattern, config.maxBlocks),
        lineWidth: config.lineWidth,
        watermark: {
            height: config.watermarkHeight,
            text: config.watermarkText,
        },
    });

    return {
        png,
        blockCount: blocks.items.length,
        droppedBlocks: blocks.dropped,
    };
}

export async function previewProofHandler(ctx: ProofContext, input: PreviewProofInput): Promise<PreviewProofOutput> {
    // Validate everything before decoding
    const designPath = ctx.designs.resolve(input.design);
    hexToRgbInt(input.bg);
    const colors = parseColorList(input.colors, ctx.config.maxBlocks);

    const pattern = ctx.designs.load(input.design);
    const result = await renderPatternPreview(pattern, input.bg, colors.items, ctx.config);
    if (result.droppedBlocks > 0) {
        console.error(`[proof] ${designPath}: ${result.droppedBlocks} block(s) past ${ctx.config.maxBlocks} not drawn`);
    }
    return result;
}

export const previewProofTool: ToolDefinition = {
    name: "preview_proof",
    description: "Renders a 900x900 PNG proof of a design with a background color and per-block thread colors. Jump/travel moves are not drawn.",
    inputSchema: {
        type: "object",
        properties: {
            design: {
                type: "string",
                description: "Master design file name",
            },
            bg: {
                type: "string",
                description: "Background (garment) color, #RRGGBB or #RGB",
            },
            colors: {
                type: "string",
                description: "Comma-separated block colors in block order (up to 20)",
            },
        },
        required: ["design", "bg", "colors"],
    },
};
