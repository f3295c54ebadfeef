/**
 * MCP (Model Context Protocol) Types
 * Based on MCP specification 2024-11-05, trimmed to what a tool client needs
 */

// =============================================================================
// JSON-RPC 2.0 Base Types
// =============================================================================

export interface JsonRpcError {
  code: number
  message: string
  data?: unknown
}

// =============================================================================
// MCP Initialize Types
// =============================================================================

export interface MCPServerInfo {
  name: string
  version: string
}

export interface MCPServerCapabilities {
  tools?: Record<string, never> // Empty object indicates support
  logging?: Record<string, never>
}

export interface MCPInitializeResult {
  protocolVersion: string
  capabilities: MCPServerCapabilities
  serverInfo: MCPServerInfo
}

// =============================================================================
// MCP Tool Types
// =============================================================================

export interface MCPToolDefinition {
  name: string
  description?: string
}

export interface MCPToolsListResult {
  tools: MCPToolDefinition[]
}

export interface MCPToolCallContentText {
  type: 'text'
  text: string
}

export interface MCPToolCallContentOther {
  type: 'image' | 'resource'
}

export type MCPToolCallContent = MCPToolCallContentText | MCPToolCallContentOther

export interface MCPToolCallResult {
  content: MCPToolCallContent[]
  isError?: boolean
}

// =============================================================================
// Client-side seams
// =============================================================================

/**
 * Anything that can invoke a named backend tool. The stdio connection is the
 * production implementation; tests supply in-process fakes.
 */
export interface ToolCaller {
  callTool(name: string, args: Record<string, unknown>, options?: { signal?: AbortSignal }): Promise<MCPToolCallResult>
}

export interface PendingRequest {
  method: string
  resolve: (value: unknown) => void
  reject: (error: Error) => void
  timeout: ReturnType<typeof setTimeout>
}

/** Concatenated text parts of a tool result */
export function toolResultText(result: MCPToolCallResult): string {
  return result.content
    .filter((part): part is MCPToolCallContentText => part.type === 'text')
    .map(part => part.text)
    .join('')
}
