import "dotenv/config";
import { FastMCP } from "fastmcp";
import {
  calculateTool,
  clearKeypadTool,
  keypadTool,
  listKeypadsTool,
  validateExpressionTool,
} from "./tools/index.ts";

const server = new FastMCP({
  name: "Keypad Calculator MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(calculateTool);
server.addTool(validateExpressionTool);
server.addTool(keypadTool);
server.addTool(listKeypadsTool);
server.addTool(clearKeypadTool);

// Start server (stdio for local MCP agents)
await server.start({ transportType: "stdio" });
