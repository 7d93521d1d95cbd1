#!/usr/bin/env node
import { loadConfig } from "../config.js";
import { createContext } from "../context.js";
import { createHttpServer } from "./server.js";

const config = loadConfig();
const server = createHttpServer(createContext(config));

server.listen(config.httpPort, () => {
    console.error(`[http] proof server running on http://localhost:${config.httpPort}`);
});
