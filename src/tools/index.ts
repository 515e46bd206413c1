/**
 * Tool Registration Index
 *
 * Exports all tool registration functions for the MCP server.
 */

export { registerTaskTools } from './tasks.js';
