export * from "./formState.js";
export * from "./formTransitions.js";
export * from "./formEngine.js";
export type * from "./formTypes.js";
export { createServer, loadFormsFromDir, summarizeSession } from "./mcpServer.js";
export type { CreateServerOptions, SessionSummary } from "./mcpServer.js";
export { loadConfig } from "./config.js";
export type { ServerConfig } from "./config.js";
