/**
 * Memory Flow Analyzer
 *
 * Follows parameters of a routine through nested calls to the memory
 * operation they end up addressing. A candidate path is only kept when its
 * last hop names a parameter that the Memory Parameter Analyzer also reports
 * for that function.
 */

import { z } from 'zod'
import { requestStructured, tableCell } from '../services/agent-parser'
import type { BinaryAnalysisClient } from '../services/binary-analysis'
import type { ChatMessage } from '../services/llm'
import {
  findingsOf,
  type FlowHop,
  type FunctionRef,
  type MemoryFlowPath,
  type MemoryParameterFinding,
  type ParseOutcome,
} from '../types/analysis'
import { addressFromPlaceholderName, formatAddress, tryParseAddress } from '../utils/address'
import { isFatal, errorMessage } from '../utils/errors'
import { silentLogger, type Logger } from '../utils/logger'
import { normalizeOperation, type MemoryParameterAnalyzer } from './memory-param-agent'
import { DRIVER_ANALYST_PROMPT, type AgentDeps } from './types'

const hopSchema = z.object({
  function: z.object({
    name: z.string(),
    address: z.string().nullable().optional(),
  }),
  parameter: z.string(),
})

const pathSchema = z.object({
  hops: z.array(hopSchema).min(1),
  operation: z.string(),
  evidence: z.string().default(''),
})

const flowSchema = z.object({ paths: z.array(pathSchema) })

type CandidatePath = z.infer<typeof pathSchema>

const FALLBACK_FORMAT = `Return only a JSON object:
{
  "paths": [
    {
      "hops": [
        {"function": {"name": "sub_11170", "address": "0x11170"}, "parameter": "a2"},
        {"function": {"name": "sub_11460", "address": "0x11460"}, "parameter": "a1"}
      ],
      "operation": "copy|move|write|read",
      "evidence": "memmove(a1, a2, a3);"
    }
  ]
}
The first hop is the analyzed function; the last hop is the function that performs the operation. Use {"paths": []} when nothing qualifies.`

function buildMessages(fn: FunctionRef, pseudocode: string, withFormat: boolean): ChatMessage[] {
  return [
    { role: 'system', content: DRIVER_ANALYST_PROMPT },
    {
      role: 'user',
      content: `Analyze ${fn.name} at ${formatAddress(fn.address)} and trace how its parameters reach the address of a memory read, write or copy.
1. Find every memory read/write/copy/initialization (memcpy/memmove/Rtl*Memory, memset, hand-written loops).
2. For each, follow the address back to a parameter, through locals, structure fields and calls to other functions.
3. Give each path as the ordered list of (function, parameter) hops ending in the function that performs the operation, with the operation and the evidence line.

\`\`\`c
${pseudocode}
\`\`\`${withFormat ? `\n\n${FALLBACK_FORMAT}` : ''}`,
    },
  ]
}

/**
 * Memory-parameter findings per function, computed at most once per run
 */
export class FindingsIndex {
  private readonly byAddress: Map<number, Promise<MemoryParameterFinding[]>> = new Map()

  constructor(
    private readonly client: BinaryAnalysisClient,
    private readonly analyzer: MemoryParameterAnalyzer
  ) {}

  /** Record findings that were computed elsewhere */
  seed(fn: FunctionRef, outcome: ParseOutcome<MemoryParameterFinding[]>): void {
    this.byAddress.set(fn.address, Promise.resolve(findingsOf(outcome)))
  }

  /**
   * Findings of `fn`, decompiling it unless `pseudocode` is given
   */
  findingsFor(fn: FunctionRef, pseudocode?: string): Promise<MemoryParameterFinding[]> {
    const known = this.byAddress.get(fn.address)
    if (known) return known

    const pending = (async () => {
      const code = pseudocode ?? (await this.client.decompile(fn))
      return findingsOf(await this.analyzer.analyze(fn, code))
    })()
    this.byAddress.set(fn.address, pending)
    return pending
  }
}

export interface MemoryFlowResult {
  outcome: ParseOutcome<MemoryFlowPath[]>
  /** Validated paths; empty when the reply did not parse */
  paths: MemoryFlowPath[]
  /** Candidates dropped because their last hop matched no finding */
  rejected: number
  /** Set when there is nothing to show */
  note?: string
}

export interface MemoryFlowDeps extends AgentDeps {
  findings: FindingsIndex
}

function sameParameter(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase()
}

export class MemoryFlowAnalyzer {
  private readonly logger: Logger

  constructor(private readonly deps: MemoryFlowDeps) {
    this.logger = deps.logger ?? silentLogger
  }

  async trace(fn: FunctionRef, pseudocode: string): Promise<MemoryFlowResult> {
    const outcome = await requestStructured({
      llm: this.deps.llm,
      purpose: `memory flow of ${fn.name}`,
      messages: buildMessages(fn, pseudocode, false),
      fallbackMessages: buildMessages(fn, pseudocode, true),
      structuredSchema: flowSchema,
    })

    if (outcome.status === 'parse_failed') {
      this.logger.warn({ function: fn.name }, 'memory flow reply did not parse')
      return {
        outcome,
        paths: [],
        rejected: 0,
        note: 'Memory flow analysis returned an unparsable reply.',
      }
    }

    const paths: MemoryFlowPath[] = []
    let rejected = 0
    for (const candidate of outcome.value.paths) {
      const path = await this.validate(fn, pseudocode, candidate)
      if (path) paths.push(path)
      else rejected++
    }

    this.logger.debug({ function: fn.name, paths: paths.length, rejected }, 'memory flow traced')

    let note: string | undefined
    if (paths.length === 0) {
      note =
        rejected > 0
          ? `No confirmed path: ${rejected} candidate path(s) did not end at a memory-parameter finding.`
          : 'No parameter reaches a memory operation.'
    }

    return { outcome: { status: 'parsed', value: paths }, paths, rejected, note }
  }

  private async validate(traced: FunctionRef, pseudocode: string, candidate: CandidatePath): Promise<MemoryFlowPath | null> {
    const operation = normalizeOperation(candidate.operation)
    if (!operation) return null

    const hops: FlowHop[] = []
    for (const hop of candidate.hops) {
      const address =
        tryParseAddress(hop.function.address ?? null) ?? addressFromPlaceholderName(hop.function.name)
      if (address === null) return null
      hops.push({ function: { address, name: hop.function.name }, parameter: hop.parameter.trim() })
    }

    const terminal = hops[hops.length - 1]
    let findings: MemoryParameterFinding[]
    try {
      findings = await this.deps.findings.findingsFor(
        terminal.function,
        terminal.function.address === traced.address ? pseudocode : undefined
      )
    } catch (err) {
      if (isFatal(err)) throw err
      this.logger.debug(errorMessage(err), `cannot check terminal hop ${terminal.function.name}`)
      return null
    }

    if (!findings.some(finding => sameParameter(finding.parameter, terminal.parameter))) {
      return null
    }
    return { hops, operation, evidence: candidate.evidence.trim() }
  }
}

function describeHop(hop: FlowHop): string {
  return `${hop.function.name}(${hop.parameter})`
}

/**
 * Markdown table of validated paths, or the result's note
 */
export function renderMemoryFlow(result: MemoryFlowResult): string {
  if (result.paths.length === 0) {
    return result.note ?? 'No parameter reaches a memory operation.'
  }

  const rows = result.paths.map(path => {
    const parameter = path.hops[0].parameter
    const route = path.hops.map(describeHop).join(' → ')
    return `| ${tableCell(parameter)} | ${path.operation} | ${tableCell(route)} | \`${tableCell(path.evidence)}\` |`
  })
  const lines = ['| Parameter | Operation | Path | Evidence |', '| --- | --- | --- | --- |', ...rows]
  if (result.rejected > 0) {
    lines.push('', `_${result.rejected} unconfirmed candidate path(s) omitted._`)
  }
  return lines.join('\n')
}
