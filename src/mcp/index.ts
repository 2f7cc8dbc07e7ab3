/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer } from './McpServerFactory.js';
export { mcpPlugin } from './fastifyPlugin.js';
export type { McpPluginOptions } from './fastifyPlugin.js';
