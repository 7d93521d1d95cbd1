/**
 * Tajima .DST codec
 *
 * Structure:
 * - Header (512 bytes of CR-terminated "XX:value" fields, 0x1A, space padding)
 * - Body (3 bytes per record, relative moves of at most 121 units per axis)
 *
 * Thread colors are carried in extended "TC:#rrggbb,description,catalog" header lines.
 * Y grows downward in decoded patterns; the file stores it upward.
 */

import { ProofError } from "../errors.js";
import { hexToRgbInt, rgbIntToHex } from "../lib/color/hex.js";
import type { EmbroideryPattern, FormatAdapter, StitchCommand, StitchRecord, ThreadColor } from "../engine/pattern.js";

const HEADER_SIZE = 512;
const MAX_STEP = 121;
const HEADER_END = 0x1a;

const FLAGS_STITCH = 0b00000011;
const FLAGS_JUMP = 0b10000011;
const FLAGS_COLOR_CHANGE = 0b11000011;
const FLAGS_END = 0b11110011;

const bit = (value: number, n: number) => (value >> n) & 1;

function decodeDx(b0: number, b1: number, b2: number): number {
    return (
        81 * (bit(b2, 2) - bit(b2, 3)) +
        27 * (bit(b1, 2) - bit(b1, 3)) +
        9 * (bit(b0, 2) - bit(b0, 3)) +
        3 * (bit(b1, 0) - bit(b1, 1)) +
        (bit(b0, 0) - bit(b0, 1))
    );
}

/**
 * Y move as stored (upward positive)
 */
function decodeDy(b0: number, b1: number, b2: number): number {
    return (
        81 * (bit(b2, 5) - bit(b2, 4)) +
        27 * (bit(b1, 5) - bit(b1, 4)) +
        9 * (bit(b0, 5) - bit(b0, 4)) +
        3 * (bit(b1, 7) - bit(b1, 6)) +
        (bit(b0, 7) - bit(b0, 6))
    );
}

/**
 * Balanced-ternary encoding of one move; |dx|, |dy| <= 121
 */
function encodeRecord(dx: number, dy: number, flags: number): Uint8Array {
    const b = new Uint8Array([0, 0, flags]);
    let x = dx;
    let y = -dy;

    if (x > 40) { b[2] |= 1 << 2; x -= 81; }
    if (x < -40) { b[2] |= 1 << 3; x += 81; }
    if (x > 13) { b[1] |= 1 << 2; x -= 27; }
    if (x < -13) { b[1] |= 1 << 3; x += 27; }
    if (x > 4) { b[0] |= 1 << 2; x -= 9; }
    if (x < -4) { b[0] |= 1 << 3; x += 9; }
    if (x > 1) { b[1] |= 1 << 0; x -= 3; }
    if (x < -1) { b[1] |= 1 << 1; x += 3; }
    if (x > 0) { b[0] |= 1 << 0; x -= 1; }
    if (x < 0) { b[0] |= 1 << 1; x += 1; }

    if (y > 40) { b[2] |= 1 << 5; y -= 81; }
    if (y < -40) { b[2] |= 1 << 4; y += 81; }
    if (y > 13) { b[1] |= 1 << 5; y -= 27; }
    if (y < -13) { b[1] |= 1 << 4; y += 27; }
    if (y > 4) { b[0] |= 1 << 5; y -= 9; }
    if (y < -4) { b[0] |= 1 << 4; y += 9; }
    if (y > 1) { b[1] |= 1 << 7; y -= 3; }
    if (y < -1) { b[1] |= 1 << 6; y += 3; }
    if (y > 0) { b[0] |= 1 << 7; y -= 1; }
    if (y < 0) { b[0] |= 1 << 6; y += 1; }

    return b;
}

interface DstHeader {
    label?: string;
    threads: ThreadColor[];
}

function parseHeader(bytes: Uint8Array): DstHeader {
    let text = Buffer.from(bytes).toString("latin1");
    const end = text.indexOf(String.fromCharCode(HEADER_END));
    if (end >= 0) {
        text = text.slice(0, end);
    }

    const header: DstHeader = { threads: [] };
    for (const line of text.split(/[\r\n]+/)) {
        if (line.length < 3 || line[2] !== ":") {
            continue;
        }
        const prefix = line.slice(0, 2).trim();
        const value = line.slice(3).trim();

        if (prefix === "LA") {
            header.label = value;
        } else if (prefix === "TC") {
            const [color = "", description = "", catalogNumber = ""] = value.split(",").map((p) => p.trim());
            if (!/^#?[0-9a-fA-F]{6}$/.test(color)) {
                continue;
            }
            header.threads.push({
                index: header.threads.length,
                rgb: hexToRgbInt(color),
                ...(description ? { description } : {}),
                ...(catalogNumber ? { catalogNumber } : {}),
            });
        }
    }
    return header;
}

export function decodeDst(bytes: Uint8Array): EmbroideryPattern {
    if (bytes.length < HEADER_SIZE) {
        throw new ProofError("unprocessable", "DST file is shorter than its 512-byte header.");
    }

    const header = parseHeader(bytes.subarray(0, HEADER_SIZE));
    const stitches: StitchRecord[] = [];
    let x = 0;
    let y = 0;

    for (let i = HEADER_SIZE; i + 2 < bytes.length; i += 3) {
        const b0 = bytes[i];
        const b1 = bytes[i + 1];
        const b2 = bytes[i + 2];

        if ((b2 & FLAGS_END) === FLAGS_END) {
            break;
        }

        x += decodeDx(b0, b1, b2);
        y -= decodeDy(b0, b1, b2);

        let command: StitchCommand = "stitch";
        if ((b2 & FLAGS_COLOR_CHANGE) === FLAGS_COLOR_CHANGE) {
            command = "color_change";
        } else if ((b2 & FLAGS_JUMP) === FLAGS_JUMP) {
            command = "jump";
        }
        stitches.push({ x, y, command });
    }
    stitches.push({ x, y, command: "end" });

    return {
        ...(header.label ? { label: header.label } : {}),
        stitches,
        threads: header.threads,
    };
}

function headerField(prefix: string, value: string): string {
    return `${prefix}:${value}\r`;
}

function signed5(n: number): string {
    return `${n < 0 ? "-" : "+"}${String(Math.abs(n)).padStart(5, " ")}`;
}

export function encodeDst(pattern: EmbroideryPattern): Uint8Array {
    const records: Uint8Array[] = [];
    let curX = 0;
    let curY = 0;
    let minX = 0;
    let maxX = 0;
    let minY = 0;
    let maxY = 0;
    let colorChanges = 0;

    const moveTo = (tx: number, ty: number, flags: number) => {
        const startX = curX;
        const startY = curY;
        const steps = Math.max(1, Math.ceil(Math.max(Math.abs(tx - startX), Math.abs(ty - startY)) / MAX_STEP));
        for (let k = 1; k <= steps; k++) {
            const nx = startX + Math.round(((tx - startX) * k) / steps);
            const ny = startY + Math.round(((ty - startY) * k) / steps);
            records.push(encodeRecord(nx - curX, ny - curY, flags));
            curX = nx;
            curY = ny;
        }
        minX = Math.min(minX, curX);
        maxX = Math.max(maxX, curX);
        minY = Math.min(minY, curY);
        maxY = Math.max(maxY, curY);
    };

    for (const stitch of pattern.stitches) {
        const tx = Math.round(stitch.x);
        const ty = Math.round(stitch.y);

        switch (stitch.command) {
            case "stitch":
                moveTo(tx, ty, FLAGS_STITCH);
                break;
            case "jump":
                moveTo(tx, ty, FLAGS_JUMP);
                break;
            case "trim":
                if (tx !== curX || ty !== curY) {
                    moveTo(tx, ty, FLAGS_JUMP);
                }
                records.push(encodeRecord(0, 0, FLAGS_JUMP));
                break;
            case "stop":
            case "color_change":
                if (tx !== curX || ty !== curY) {
                    moveTo(tx, ty, FLAGS_JUMP);
                }
                records.push(encodeRecord(0, 0, FLAGS_COLOR_CHANGE));
                colorChanges++;
                break;
            case "end":
                break;
        }
    }
    records.push(new Uint8Array([0, 0, FLAGS_END]));

    const label = (pattern.label ?? "").slice(0, 16).padEnd(16, " ");
    let headerText =
        headerField("LA", label) +
        headerField("ST", String(records.length).padStart(7, " ")) +
        headerField("CO", String(colorChanges).padStart(3, " ")) +
        headerField("+X", String(maxX).padStart(5, " ")) +
        headerField("-X", String(Math.abs(minX)).padStart(5, " ")) +
        headerField("+Y", String(Math.abs(minY)).padStart(5, " ")) +
        headerField("-Y", String(maxY).padStart(5, " ")) +
        headerField("AX", signed5(curX)) +
        headerField("AY", signed5(-curY)) +
        headerField("MX", signed5(0)) +
        headerField("MY", signed5(0)) +
        headerField("PD", "******");

    for (const thread of pattern.threads) {
        const desc = (thread.description ?? "").replace(/[,\r\n]/g, " ");
        const catalog = (thread.catalogNumber ?? "").replace(/[,\r\n]/g, " ");
        headerText += headerField("TC", `${rgbIntToHex(thread.rgb)},${desc},${catalog}`);
    }

    const headerBytes = Buffer.from(headerText, "latin1");
    if (headerBytes.length >= HEADER_SIZE) {
        throw new ProofError("unprocessable", `DST header cannot hold ${pattern.threads.length} thread colors.`);
    }

    const out = new Uint8Array(HEADER_SIZE + records.length * 3);
    out.fill(0x20, 0, HEADER_SIZE);
    out.set(headerBytes, 0);
    out[headerBytes.length] = HEADER_END;

    let offset = HEADER_SIZE;
    for (const record of records) {
        out.set(record, offset);
        offset += 3;
    }
    return out;
}

export const dstFormat: FormatAdapter = {
    extension: ".dst",
    name: "Tajima DST",
    decode: decodeDst,
    encode: encodeDst,
};
