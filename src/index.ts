#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { createContext } from "./context.js";
import { ProofServer } from "./server.js";

const server = new ProofServer(createContext(loadConfig()));
server.run().catch((error) => {
    console.error("[MCP Error]", error);
    process.exit(1);
});
