/**
 * Agent Parser Service
 *
 * Unified LLM output parsing for the analyzers: structured output when the
 * backend has it, otherwise a text reply with JSON pulled out of it.
 * Unparsable replies come back as `parse_failed` with the raw text.
 */

import { parseFailed, parsedOk, type ParseOutcome } from '../types/analysis'
import { extractJson } from '../utils/json-extract'
import type { ChatMessage, LlmClient, StructuredSchema } from './llm'

export interface RequestStructuredOptions<T> {
  llm: LlmClient
  /** Used in error messages and logs */
  purpose: string
  /** Schema-mode prompt */
  messages: ChatMessage[]
  /** Prompt for the text fallback; defaults to `messages` */
  fallbackMessages?: ChatMessage[]
  /** Shape requested in schema mode */
  structuredSchema: StructuredSchema<T>
  /** Looser shape accepted from extracted JSON; defaults to `structuredSchema` */
  fallbackSchema?: StructuredSchema<T>
}

export async function requestStructured<T>(options: RequestStructuredOptions<T>): Promise<ParseOutcome<T>> {
  const { llm, purpose, messages, structuredSchema } = options

  const structured = await llm.structured(messages, structuredSchema, purpose)
  if (structured !== null) {
    return parsedOk(structured)
  }

  const raw = await llm.text(options.fallbackMessages ?? messages, purpose)
  return parseReply(raw, options.fallbackSchema ?? structuredSchema)
}

/**
 * Validate JSON embedded in a free-text reply
 */
export function parseReply<T>(raw: string, schema: StructuredSchema<T>): ParseOutcome<T> {
  const json = extractJson(raw)
  if (json === undefined) {
    return parseFailed(raw)
  }

  const result = schema.safeParse(json)
  return result.success ? parsedOk(result.data) : parseFailed(raw)
}

/**
 * Build a summary with item count and truncated list
 */
export function buildItemSummary<T>(items: T[], mapper: (item: T) => string, prefix: string, maxItems: number = 5): string {
  if (items.length === 0) return `0 ${prefix}`

  const displayed = items.slice(0, maxItems).map(mapper).join(', ')
  const moreCount = items.length > maxItems ? ` +${items.length - maxItems} more` : ''

  return `${items.length} ${prefix}: ${displayed}${moreCount}`
}

/** Escape a value for a Markdown table cell */
export function tableCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ').trim()
}
