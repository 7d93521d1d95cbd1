import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
    type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ProofContext } from "./context.js";
import { isProofError } from "./errors.js";
import { tools } from "./tools/index.js";
import { healthHandler } from "./tools/health.js";
import { designInfoHandler, listDesignsHandler, resolveDesignLinkHandler } from "./tools/design_info.js";
import { previewProofHandler } from "./tools/preview_proof.js";
import { saveProofHandler } from "./tools/save_proof.js";
import { backupBundleHandler, downloadProofHandler, listProofsHandler } from "./tools/admin.js";

const isTestEnv = () => process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";

function jsonResult(value: unknown): CallToolResult {
    return {
        content: [
            {
                type: "text",
                text: JSON.stringify(value, null, 2),
            },
        ],
    };
}

/**
 * Parses tool arguments, raising InvalidParams with the first issue
 */
function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown, toolName: string): z.infer<T> {
    const parseResult = schema.safeParse(args ?? {});
    if (!parseResult.success) {
        throw new McpError(
            ErrorCode.InvalidParams,
            parseResult.error.issues[0]?.message || `Invalid parameters for ${toolName}`
        );
    }
    return parseResult.data;
}

/**
 * Proof MCP Server
 * Embroidery color proofs: previews, recolored design files and proof history
 */
export class ProofServer {
    private server: Server;

    constructor(private readonly ctx: ProofContext) {
        this.server = new Server(
            {
                name: "stitchproof-mcp",
                version: "1.0.0",
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);

        // Only set up SIGINT handler if not in test environment
        if (!isTestEnv()) {
            process.on("SIGINT", () => {
                this.close()
                    .then(() => process.exit(0))
                    .catch((error) => {
                        console.error("[MCP Error]", error);
                        process.exit(1);
                    });
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;
            try {
                return await this.callTool(toolName, request.params.arguments);
            } catch (error) {
                if (error instanceof McpError) {
                    throw error;
                }
                if (isProofError(error)) {
                    return {
                        content: [
                            {
                                type: "text",
                                text: `ERROR-${error.kind.toUpperCase()}: ${error.message}`,
                            },
                        ],
                        isError: true,
                    };
                }
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }
        });
    }

    private async callTool(toolName: string, args: unknown): Promise<CallToolResult> {
        const { ctx } = this;

        if (toolName === "health") {
            return jsonResult(healthHandler(ctx, tools.length));
        }

        if (toolName === "list_designs") {
            return jsonResult(listDesignsHandler(ctx));
        }

        if (toolName === "design_info") {
            const { design } = parseArgs(z.object({ design: z.string().min(1) }), args, toolName);
            return jsonResult(designInfoHandler(ctx, { design }));
        }

        if (toolName === "resolve_design_link") {
            const { slug } = parseArgs(z.object({ slug: z.string().min(1) }), args, toolName);
            return jsonResult(resolveDesignLinkHandler(ctx, { slug }));
        }

        if (toolName === "preview_proof") {
            const input = parseArgs(
                z.object({
                    design: z.string().min(1),
                    bg: z.string(),
                    colors: z.string(),
                }),
                args,
                toolName
            );
            const result = await previewProofHandler(ctx, input);
            return {
                content: [
                    {
                        type: "image",
                        data: result.png.toString("base64"),
                        mimeType: "image/png",
                    },
                    {
                        type: "text",
                        text: JSON.stringify({ blockCount: result.blockCount, droppedBlocks: result.droppedBlocks }),
                    },
                ],
            };
        }

        if (toolName === "save_proof") {
            const input = parseArgs(
                z.object({
                    design_file: z.string().min(1),
                    client_tag: z.string(),
                    bg_hex: z.string(),
                    colors_csv: z.string(),
                }),
                args,
                toolName
            );
            const result = saveProofHandler(ctx, {
                designFile: input.design_file,
                clientTag: input.client_tag,
                bgHex: input.bg_hex,
                colorsCsv: input.colors_csv,
            });
            return jsonResult(result);
        }

        if (toolName === "list_proofs") {
            const input = parseArgs(
                z.object({
                    pw: z.string(),
                    limit: z.number().int().positive().optional().default(200),
                }),
                args,
                toolName
            );
            return jsonResult(listProofsHandler(ctx, input));
        }

        if (toolName === "download_proof") {
            const input = parseArgs(z.object({ pw: z.string(), proof_id: z.string().min(1) }), args, toolName);
            const file = downloadProofHandler(ctx, { pw: input.pw, proofId: input.proof_id });
            return jsonResult({ filename: file.filename, base64: file.data.toString("base64") });
        }

        if (toolName === "backup_bundle") {
            const input = parseArgs(z.object({ pw: z.string() }), args, toolName);
            const bundle = await backupBundleHandler(ctx, input);
            return jsonResult({
                filename: bundle.filename,
                entries: bundle.entries,
                base64: bundle.data.toString("base64"),
            });
        }

        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !isTestEnv()) {
            console.error("stitchproof MCP server running on stdio");
        }
    }

    async close() {
        await this.server.close();
        this.ctx.store.close();
    }
}
