/**
 * Memory Parameter Analyzer
 *
 * Which parameters of a routine serve as the base, destination or source
 * address of a memory read, write or copy.
 */

import { z } from 'zod'
import { requestStructured, tableCell } from '../services/agent-parser'
import type { ChatMessage } from '../services/llm'
import type {
  FunctionRef,
  MemoryOperation,
  MemoryParameterFinding,
  ParseOutcome,
} from '../types/analysis'
import { formatAddress } from '../utils/address'
import { silentLogger, type Logger } from '../utils/logger'
import { DRIVER_ANALYST_PROMPT, type AgentDeps } from './types'

const OPERATION_ALIASES: Record<string, MemoryOperation> = {
  read: 'read',
  write: 'write',
  copy: 'copy',
  move: 'copy',
}

/** `move` is reported as `copy`; anything unknown is dropped */
export function normalizeOperation(value: string): MemoryOperation | null {
  return OPERATION_ALIASES[value.trim().toLowerCase()] ?? null
}

const structuredFindingSchema = z.object({
  param: z.string(),
  operation: z.enum(['read', 'write', 'copy', 'move']),
  description: z.string(),
  evidence: z.string().describe('The exact pseudocode line'),
})

const structuredSchema = z.object({
  has_memory_address_param: z.boolean(),
  memory_parameters: z.array(structuredFindingSchema),
})

// Text replies drift: optional fields, other operation words
const looseFindingSchema = z.object({
  param: z.string().optional(),
  parameter: z.string().optional(),
  operation: z.string(),
  description: z.string().default(''),
  evidence: z.string().default(''),
})

const looseSchema = z.object({
  has_memory_address_param: z.boolean().optional(),
  memory_parameters: z.array(looseFindingSchema).default([]),
})

interface RawFinding {
  param?: string
  parameter?: string
  operation: string
  description: string
  evidence: string
}

function toFindings(raw: RawFinding[]): MemoryParameterFinding[] {
  const findings: MemoryParameterFinding[] = []
  for (const item of raw) {
    const parameter = (item.param ?? item.parameter ?? '').trim()
    const operation = normalizeOperation(item.operation)
    if (!parameter || !operation) continue
    findings.push({
      parameter,
      operation,
      description: item.description.trim(),
      evidence: item.evidence.trim(),
    })
  }
  return findings
}

const FALLBACK_FORMAT = `Return only a JSON object:
{
  "has_memory_address_param": true,
  "memory_parameters": [
    {"param": "a1", "operation": "copy|move|write|read", "description": "a1 is the destination of RtlCopyMemory", "evidence": "RtlCopyMemory(a1, v4, Length);"}
  ]
}
If no parameter qualifies, memory_parameters is empty and has_memory_address_param is false.`

function buildMessages(fn: FunctionRef, pseudocode: string, withFormat: boolean): ChatMessage[] {
  return [
    { role: 'system', content: DRIVER_ANALYST_PROMPT },
    {
      role: 'user',
      content: `Analyze ${fn.name} at ${formatAddress(fn.address)}.
Decide which parameters (if any) give the address of a memory read, write or copy.
1. Locate memcpy/memmove/Rtl*Memory, memset, buffer read/write loops and similar operations.
2. For each, trace the address operands and check whether they come from a parameter directly or by offset arithmetic.
3. Report one entry per use, quoting the exact pseudocode line as evidence.

\`\`\`c
${pseudocode}
\`\`\`${withFormat ? `\n\n${FALLBACK_FORMAT}` : ''}`,
    },
  ]
}

export class MemoryParameterAnalyzer {
  private readonly logger: Logger

  constructor(private readonly deps: AgentDeps) {
    this.logger = deps.logger ?? silentLogger
  }

  async analyze(fn: FunctionRef, pseudocode: string): Promise<ParseOutcome<MemoryParameterFinding[]>> {
    const outcome = await requestStructured<RawFinding[]>({
      llm: this.deps.llm,
      purpose: `memory parameters of ${fn.name}`,
      messages: buildMessages(fn, pseudocode, false),
      fallbackMessages: buildMessages(fn, pseudocode, true),
      structuredSchema: structuredSchema.transform(value => value.memory_parameters),
      fallbackSchema: looseSchema.transform(value => value.memory_parameters),
    })

    if (outcome.status === 'parse_failed') {
      this.logger.warn({ function: fn.name }, 'memory parameter reply did not parse')
      return outcome
    }

    const findings = toFindings(outcome.value)
    this.logger.debug({ function: fn.name, findings: findings.length }, 'memory parameters analyzed')
    return { status: 'parsed', value: findings }
  }
}

/**
 * Markdown table of findings, or an explicit "none" / parse-failure line
 */
export function renderMemoryParameters(outcome: ParseOutcome<MemoryParameterFinding[]>): string {
  if (outcome.status === 'parse_failed') {
    return '_Memory parameter analysis returned an unparsable reply; no findings recorded._'
  }
  if (outcome.value.length === 0) {
    return 'No parameter controls a memory address.'
  }

  const rows = outcome.value.map(
    finding =>
      `| ${tableCell(finding.parameter)} | ${finding.operation} | ${tableCell(finding.description)} | \`${tableCell(finding.evidence)}\` |`
  )
  return ['| Parameter | Operation | Description | Evidence |', '| --- | --- | --- | --- |', ...rows].join('\n')
}
