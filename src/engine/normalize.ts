/**
 * Fits block geometry into a square canvas with uniform scale
 */

import type { Block } from "./geometry.js";

export interface NormalizeOptions {
    padding?: number;
    canvas?: number;
}

export interface NormalizedBlocks {
    blocks: Block[];
    canvas: number;
}

/**
 * Scales and translates every segment so the longer bounding-box axis spans
 * [padding, canvas - padding]. The result is anchored at the top-left of the
 * padded area rather than centered.
 */
export function normalizeBlocks(blocks: Block[], options: NormalizeOptions = {}): NormalizedBlocks {
    const { padding = 40, canvas = 900 } = options;

    let minx = Infinity;
    let maxx = -Infinity;
    let miny = Infinity;
    let maxy = -Infinity;
    let points = 0;

    for (const block of blocks) {
        for (const seg of block) {
            minx = Math.min(minx, seg.x1, seg.x2);
            maxx = Math.max(maxx, seg.x1, seg.x2);
            miny = Math.min(miny, seg.y1, seg.y2);
            maxy = Math.max(maxy, seg.y1, seg.y2);
            points += 2;
        }
    }

    if (points === 0) {
        return { blocks, canvas };
    }

    // Degenerate (single point or straight line) boxes get a unit extent
    const width = Math.max(maxx - minx, 1);
    const height = Math.max(maxy - miny, 1);
    const scale = (canvas - 2 * padding) / Math.max(width, height);

    const mapX = (x: number) => (x - minx) * scale + padding;
    const mapY = (y: number) => (y - miny) * scale + padding;

    return {
        blocks: blocks.map((block) =>
            block.map((seg) => ({
                x1: mapX(seg.x1),
                y1: mapY(seg.y1),
                x2: mapX(seg.x2),
                y2: mapY(seg.y2),
            }))
        ),
        canvas,
    };
}
