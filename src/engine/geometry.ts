/**
 * Stitch stream to drawable geometry
 * Long stitch-to-stitch moves are treated as travel and never drawn.
 */

import type { StitchRecord } from "./pattern.js";

export const DEFAULT_JUMP_THRESHOLD = 45.0;
export const MAX_BLOCKS = 20;

export type Segment = {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
};

/**
 * Segments sharing one color slot
 */
export type Block = Segment[];

/**
 * Splits the stitch stream into color blocks of line segments.
 *
 * A stitch further than `jumpThreshold` from the previous point moves the pen
 * without drawing; exactly at the threshold it is drawn. Explicit jump, trim,
 * stop and end records break the line. Empty blocks are skipped, so block
 * indices count only blocks that drew something.
 */
export function extractBlocks(
    stitches: readonly StitchRecord[],
    jumpThreshold: number = DEFAULT_JUMP_THRESHOLD
): Block[] {
    const blocks: Block[] = [];
    let current: Block = [];
    let last: { x: number; y: number } | null = null;

    for (const { x, y, command } of stitches) {
        if (command === "stitch") {
            if (last !== null) {
                const dx = x - last.x;
                const dy = y - last.y;
                const dist = Math.sqrt(dx * dx + dy * dy);
                if (dist <= jumpThreshold) {
                    current.push({ x1: last.x, y1: last.y, x2: x, y2: y });
                }
            }
            last = { x, y };
        } else if (command === "color_change") {
            if (current.length > 0) {
                blocks.push(current);
                current = [];
            }
            last = null;
        } else {
            last = null;
        }
    }

    if (current.length > 0) {
        blocks.push(current);
    }

    return blocks;
}

/**
 * Number of blocks a consumer sees: min(extracted, maxBlocks)
 */
export function countBlocks(
    stitches: readonly StitchRecord[],
    jumpThreshold: number = DEFAULT_JUMP_THRESHOLD,
    maxBlocks: number = MAX_BLOCKS
): number {
    return Math.min(extractBlocks(stitches, jumpThreshold).length, maxBlocks);
}
