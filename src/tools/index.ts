/**
 * Tools aggregator - Exports all tool definitions
 */

import { backupBundleTool, downloadProofTool, listProofsTool } from "./admin.js";
import { designInfoTool, listDesignsTool, resolveDesignLinkTool } from "./design_info.js";
import { healthTool } from "./health.js";
import { previewProofTool } from "./preview_proof.js";
import { saveProofTool } from "./save_proof.js";
import type { ToolDefinition } from "./types.js";

export type { ToolDefinition };

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = [
    healthTool,
    listDesignsTool,
    designInfoTool,
    resolveDesignLinkTool,
    previewProofTool,
    saveProofTool,
    listProofsTool,
    downloadProofTool,
    backupBundleTool,
];
