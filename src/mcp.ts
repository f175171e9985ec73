/**
 * Starts the credentials MCP server on stdio.
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGraphApi } from "./api.js";
import { loadGraphSettings } from "./config.js";
import { createServer } from "./server.js";

const server = createServer(createGraphApi(loadGraphSettings()));

const transport = new StdioServerTransport();
await server.connect(transport);
