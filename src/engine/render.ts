/**
 * Raster preview renderer
 * Draws normalized blocks as an SVG document and rasterizes it to PNG with sharp.
 */

import sharp from "sharp";
import { normalizeHex } from "../lib/color/hex.js";
import type { Block } from "./geometry.js";

export const FALLBACK_BLOCK_COLOR = "#000000";

export interface WatermarkOptions {
    height: number;
    text: string;
}

export interface RenderOptions {
    canvas: number;
    background: string;
    /** User-chosen colors, one per block by position */
    overrides: readonly string[];
    /** Colors from the design's own thread list */
    fallback: readonly string[];
    lineWidth?: number;
    watermark: WatermarkOptions;
}

/**
 * Picks the color for block i: override, then the design's thread color, then black
 */
export function resolveBlockColor(index: number, overrides: readonly string[], fallback: readonly string[]): string {
    if (index < overrides.length) {
        return normalizeHex(overrides[index]);
    }
    if (index < fallback.length) {
        return normalizeHex(fallback[index]);
    }
    return FALLBACK_BLOCK_COLOR;
}

function fmt(n: number): string {
    return String(Number(n.toFixed(2)));
}

function escapeXml(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&apos;");
}

export function buildPreviewSvg(blocks: readonly Block[], options: RenderOptions): string {
    const { canvas, watermark } = options;
    const lineWidth = options.lineWidth ?? 2;
    const parts: string[] = [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${canvas}" height="${canvas}" viewBox="0 0 ${canvas} ${canvas}">`,
        `<rect x="0" y="0" width="${canvas}" height="${canvas}" fill="${normalizeHex(options.background)}"/>`,
    ];

    blocks.forEach((block, i) => {
        if (block.length === 0) {
            return;
        }
        const color = resolveBlockColor(i, options.overrides, options.fallback);
        const d = block
            .map((seg) => `M${fmt(seg.x1)} ${fmt(seg.y1)}L${fmt(seg.x2)} ${fmt(seg.y2)}`)
            .join("");
        parts.push(
            `<path d="${d}" fill="none" stroke="${color}" stroke-width="${lineWidth}" stroke-linecap="butt" shape-rendering="crispEdges"/>`
        );
    });

    // Watermark band always sits on top of the geometry
    const bandTop = canvas - watermark.height;
    parts.push(`<rect x="0" y="${bandTop}" width="${canvas}" height="${watermark.height}" fill="#000000"/>`);
    parts.push(
        `<text x="10" y="${canvas - 9}" font-family="sans-serif" font-size="12" fill="#ffffff">${escapeXml(watermark.text)}</text>`
    );
    parts.push("</svg>");

    return parts.join("\n");
}

/**
 * Renders blocks to an opaque canvas x canvas PNG
 */
export async function renderPreviewPng(blocks: readonly Block[], options: RenderOptions): Promise<Buffer> {
    const svg = buildPreviewSvg(blocks, options);
    return await sharp(Buffer.from(svg)).removeAlpha().png().toBuffer();
}
