/**
 * Design listing and per-design color info
 */

import type { ProofContext } from "../context.js";
import { countBlocks } from "../engine/geometry.js";
import { threadHexColors } from "../engine/recolor.js";
import type { ToolDefinition } from "./types.js";

export interface DesignInfoInput {
    design: string;
}

export interface DesignInfoOutput {
    design: string;
    colors: string[];
    blockCount: number;
}

export interface ListDesignsOutput {
    designs: string[];
    formats: string[];
}

export function listDesignsHandler(ctx: ProofContext): ListDesignsOutput {
    return {
        designs: ctx.designs.list(),
        formats: ctx.formats.extensions,
    };
}

/**
 * Native thread colors and the capped block count of a master design
 */
export function designInfoHandler(ctx: ProofContext, input: DesignInfoInput): DesignInfoOutput {
    const pattern = ctx.designs.load(input.design);
    return {
        design: input.design,
        colors: threadHexColors(pattern, ctx.config.maxBlocks),
        blockCount: countBlocks(pattern.stitches, ctx.config.jumpThreshold, ctx.config.maxBlocks),
    };
}

export interface ResolveDesignLinkInput {
    slug: string;
}

/**
 * Design info for a slug from design_map.json
 */
export function resolveDesignLinkHandler(ctx: ProofContext, input: ResolveDesignLinkInput): DesignInfoOutput {
    const design = ctx.designs.resolveSlug(input.slug);
    return designInfoHandler(ctx, { design });
}

export const listDesignsTool: ToolDefinition = {
    name: "list_designs",
    description: "Lists master embroidery design files available for proofing. Only registered formats are listed (Tajima .dst by default); a DST master needs TC: thread-color header lines before a proof can be saved from it.",
    inputSchema: {
        type: "object",
        properties: {},
    },
};

export const designInfoTool: ToolDefinition = {
    name: "design_info",
    description: "Returns a design's native thread colors and the number of color blocks a proof can recolor (max 20)",
    inputSchema: {
        type: "object",
        properties: {
            design: {
                type: "string",
                description: "Master design file name (e.g., rose.dst)",
            },
        },
        required: ["design"],
    },
};

export const resolveDesignLinkTool: ToolDefinition = {
    name: "resolve_design_link",
    description: "Resolves a locked design link slug (design_map.json) to its design info",
    inputSchema: {
        type: "object",
        properties: {
            slug: {
                type: "string",
                description: "Link slug",
            },
        },
        required: ["slug"],
    },
};
