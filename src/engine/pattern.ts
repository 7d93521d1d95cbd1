/**
 * Decoded embroidery design: ordered stitch records plus the thread list
 */

export type StitchCommand = "stitch" | "jump" | "trim" | "stop" | "end" | "color_change";

/**
 * One record of the stitch stream, in the design's native units
 */
export type StitchRecord = {
    readonly x: number;
    readonly y: number;
    readonly command: StitchCommand;
};

/**
 * Thread slot; rgb is a 24-bit 0xRRGGBB integer
 */
export type ThreadColor = {
    index: number;
    rgb: number;
    description?: string;
    catalogNumber?: string;
};

export type EmbroideryPattern = {
    label?: string;
    stitches: StitchRecord[];
    threads: ThreadColor[];
};

/**
 * Codec for one design file format
 */
export interface FormatAdapter {
    /** Lowercase extension including the dot, e.g. ".dst" */
    readonly extension: string;
    readonly name: string;
    decode(bytes: Uint8Array): EmbroideryPattern;
    encode(pattern: EmbroideryPattern): Uint8Array;
}
