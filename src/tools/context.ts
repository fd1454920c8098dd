import type { Context } from "fastmcp";

export type MCPContext = Context<Record<string, unknown> | undefined>;

/** The part of the FastMCP logger the tools write to */
export type ToolLog = Pick<MCPContext["log"], "debug" | "info">;
