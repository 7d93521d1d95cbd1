/**
 * HTTP wrapper around the proof tools
 * Same operations as the MCP server, for browser widgets and admin downloads
 */

import http from "http";
import { z } from "zod";
import type { ProofContext } from "../context.js";
import { HTTP_STATUS_BY_KIND, isProofError } from "../errors.js";
import { designInfoHandler, listDesignsHandler, resolveDesignLinkHandler } from "../tools/design_info.js";
import { previewProofHandler } from "../tools/preview_proof.js";
import { saveProofHandler } from "../tools/save_proof.js";
import { backupBundleHandler, downloadProofHandler, listProofsHandler } from "../tools/admin.js";

const saveProofBodySchema = z.object({
    design_file: z.string().min(1, "design_file is required"),
    client_tag: z.string().default(""),
    bg_hex: z.string().min(1, "bg_hex is required"),
    colors_csv: z.string().min(1, "colors_csv is required"),
});

class BadRequest extends Error {}

class PayloadTooLarge extends Error {}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(body));
}

function sendFile(res: http.ServerResponse, contentType: string, filename: string, data: Buffer): void {
    res.writeHead(200, {
        "Content-Type": contentType,
        "Content-Disposition": `attachment; filename=${filename}`,
        "Content-Length": data.length,
    });
    res.end(data);
}

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

/**
 * Buffers the request body; bodies past maxBytes are drained and rejected
 */
function readBody(req: http.IncomingMessage, maxBytes: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let tooLarge = false;
        req.on("data", (chunk: Buffer) => {
            if (tooLarge) {
                return;
            }
            size += chunk.length;
            if (size > maxBytes) {
                tooLarge = true;
                chunks.length = 0;
                return;
            }
            chunks.push(chunk);
        });
        req.on("end", () => {
            if (tooLarge) {
                reject(new PayloadTooLarge(`Request body exceeds ${maxBytes} bytes`));
                return;
            }
            resolve(Buffer.concat(chunks));
        });
        req.on("error", reject);
    });
}

/**
 * Accepts JSON, form-encoded and multipart bodies
 */
async function parseBody(req: http.IncomingMessage, body: Buffer): Promise<unknown> {
    const contentType = req.headers["content-type"] ?? "";
    if (contentType.includes("application/x-www-form-urlencoded")) {
        return Object.fromEntries(new URLSearchParams(body.toString("utf-8")));
    }
    if (contentType.includes("multipart/form-data")) {
        let form: FormData;
        try {
            form = await new Request("http://localhost/", {
                method: "POST",
                headers: { "content-type": contentType },
                body,
            }).formData();
        } catch {
            throw new BadRequest("Request body is not valid multipart form data");
        }
        const fields: Record<string, string> = {};
        form.forEach((value, key) => {
            if (typeof value === "string") {
                fields[key] = value;
            }
        });
        return fields;
    }
    try {
        return JSON.parse(body.toString("utf-8") || "{}");
    } catch {
        throw new BadRequest("Request body is not valid JSON");
    }
}

function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        throw new BadRequest("Malformed path segment");
    }
}

function requireParam(url: URL, name: string): string {
    const value = url.searchParams.get(name);
    if (value === null) {
        throw new BadRequest(`Missing query parameter: ${name}`);
    }
    return value;
}

async function route(
    ctx: ProofContext,
    options: Required<HttpServerOptions>,
    req: http.IncomingMessage,
    res: http.ServerResponse
): Promise<void> {
    const url = new URL(req.url || "/", "http://localhost");
    const path = url.pathname;
    const method = req.method ?? "GET";

    if (path === "/health" && method === "GET") {
        sendJson(res, 200, { ok: true, message: "Proof server running" });
        return;
    }

    if (path === "/designs" && method === "GET") {
        sendJson(res, 200, listDesignsHandler(ctx));
        return;
    }

    if (path === "/design-info" && method === "GET") {
        sendJson(res, 200, designInfoHandler(ctx, { design: requireParam(url, "design") }));
        return;
    }

    const slugMatch = /^\/w\/([^/]+)$/.exec(path);
    if (slugMatch && method === "GET") {
        sendJson(res, 200, resolveDesignLinkHandler(ctx, { slug: decodeSegment(slugMatch[1]) }));
        return;
    }

    if (path === "/preview.png" && method === "GET") {
        const result = await previewProofHandler(ctx, {
            design: requireParam(url, "design"),
            bg: requireParam(url, "bg"),
            colors: requireParam(url, "colors"),
        });
        res.writeHead(200, { "Content-Type": "image/png", "Content-Length": result.png.length });
        res.end(result.png);
        return;
    }

    if (path === "/save-proof" && method === "POST") {
        const parsed = saveProofBodySchema.safeParse(await parseBody(req, await readBody(req, options.maxBodyBytes)));
        if (!parsed.success) {
            throw new BadRequest(parsed.error.issues[0]?.message || "Invalid save-proof body");
        }
        const result = saveProofHandler(ctx, {
            designFile: parsed.data.design_file,
            clientTag: parsed.data.client_tag,
            bgHex: parsed.data.bg_hex,
            colorsCsv: parsed.data.colors_csv,
        });
        sendJson(res, 200, { proof_id: result.proofId });
        return;
    }

    if (path === "/admin/proofs" && method === "GET") {
        sendJson(res, 200, listProofsHandler(ctx, { pw: url.searchParams.get("pw") ?? "" }));
        return;
    }

    const downloadMatch = /^\/admin\/download\/([^/]+)$/.exec(path);
    if (downloadMatch && method === "GET") {
        const file = downloadProofHandler(ctx, {
            pw: url.searchParams.get("pw") ?? "",
            proofId: decodeSegment(downloadMatch[1]),
        });
        sendFile(res, "application/octet-stream", file.filename, file.data);
        return;
    }

    if (path === "/admin/backup.zip" && method === "GET") {
        const bundle = await backupBundleHandler(ctx, { pw: url.searchParams.get("pw") ?? "" });
        sendFile(res, "application/zip", bundle.filename, bundle.data);
        return;
    }

    sendJson(res, 404, { ok: false, error: "Not found" });
}

export interface HttpServerOptions {
    maxBodyBytes?: number;
}

export function createHttpServer(ctx: ProofContext, options: HttpServerOptions = {}): http.Server {
    const resolved: Required<HttpServerOptions> = {
        maxBodyBytes: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
    };
    return http.createServer((req, res) => {
        route(ctx, resolved, req, res).catch((error: unknown) => {
            if (isProofError(error)) {
                sendJson(res, HTTP_STATUS_BY_KIND[error.kind], { ok: false, error: error.message });
                return;
            }
            if (error instanceof BadRequest) {
                sendJson(res, 400, { ok: false, error: error.message });
                return;
            }
            if (error instanceof PayloadTooLarge) {
                sendJson(res, 413, { ok: false, error: error.message });
                return;
            }
            console.error("[http] request failed:", req.method, req.url, error);
            sendJson(res, 500, {
                ok: false,
                error: error instanceof Error ? error.message : "Unknown error",
            });
        });
    });
}
