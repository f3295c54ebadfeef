import type { LlmClient } from '../services/llm'
import type { Logger } from '../utils/logger'

/**
 * Result returned by a unit entrypoint
 */
export interface AgentResult<T = unknown> {
  success: boolean
  summary: string
  data?: T
}

/**
 * What every LLM-backed analyzer is constructed with
 */
export interface AgentDeps {
  llm: LlmClient
  logger?: Logger
}

/** System prompt shared by the reverse-engineering analyzers */
export const DRIVER_ANALYST_PROMPT =
  'You are a Windows driver reverse engineer. You read Hex-Rays pseudocode from IDA Pro and answer precisely, citing the pseudocode.'
