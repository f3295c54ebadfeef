export * from './types/analysis'
export * from './utils/errors'
export { formatAddress, parseAddress, tryParseAddress } from './utils/address'
export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger'
export { loadConfig, type TriageConfig, type TriageConfigInput } from './utils/user-config'
export { McpConnection, McpRequestError, type McpConnectionConfig } from './services/mcp-connection'
export type { ToolCaller, MCPToolCallResult } from './services/mcp-types'
export { BinaryAnalysisClient } from './services/binary-analysis'
export { CacheStore, withCacheStore } from './services/cache-store'
export { LlmClient, createLlmBackend, type ChatMessage, type LlmBackend } from './services/llm'
export { Summarizer } from './agents/summarizer'
export { MemoryParameterAnalyzer, renderMemoryParameters } from './agents/memory-param-agent'
export { FindingsIndex, MemoryFlowAnalyzer, renderMemoryFlow, type MemoryFlowResult } from './agents/memory-flow-agent'
export { DispatchResolver, matchDispatchAssignment, type DispatchResolution } from './agents/dispatch-resolver'
export { IrpAccessAnalyzer, renderIrpAccess } from './agents/irp-access-agent'
export { DispatchAnnotator, findIoControlCodeLocal } from './agents/dispatch-annotator'
export { DeepReasoningAnalyzer, type DeepReasoningInput, type HandlerFindings } from './agents/deep-reasoning-agent'
export { PipelineOrchestrator, serializeCaller, type PipelineRun } from './pipeline/orchestrator'
export { PipelineStateMachine, IllegalTransitionError, type PipelineState } from './pipeline/state'
export { renderReport, writeReport, type TriageReport } from './pipeline/report'
