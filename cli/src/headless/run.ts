/**
 * Headless execution engine for drvtriage
 * Runs one unit entrypoint and returns a JSON-serializable result
 */

import { readFile } from 'fs/promises'
import type { TargetArg } from '../config/scope'
import type { CommandName } from '../constants/app-constants'
import { renderIrpAccess } from '../agents/irp-access-agent'
import { renderMemoryFlow } from '../agents/memory-flow-agent'
import { renderMemoryParameters } from '../agents/memory-param-agent'
import type { AgentResult } from '../agents/types'
import { buildItemSummary } from '../services/agent-parser'
import type { BinaryAnalysisClient } from '../services/binary-analysis'
import type { CacheStore } from '../services/cache-store'
import type { LlmClient } from '../services/llm'
import { PipelineOrchestrator, serializeCaller } from '../pipeline/orchestrator'
import { writeReport } from '../pipeline/report'
import { findingsOf, type FunctionRef } from '../types/analysis'
import { formatAddress } from '../utils/address'
import { errorMessage, isTriageError, type TriageErrorKind } from '../utils/errors'
import type { Logger } from '../utils/logger'
import type { TriageConfig } from '../utils/user-config'

export interface CommandContext {
  config: TriageConfig
  client: BinaryAnalysisClient
  llm: LlmClient
  cache: CacheStore
  logger: Logger
  runId: string
}

export interface CommandRequest {
  command: CommandName
  target?: TargetArg
  contextPath?: string
}

export interface HeadlessResult<T = unknown> extends AgentResult<T> {
  command: CommandName
  runId: string
  error?: string
  errorKind?: TriageErrorKind
  /** Seconds */
  duration: number
}

function requireTarget(request: CommandRequest): FunctionRef {
  if (!request.target) {
    throw new Error(`${request.command} needs a target`)
  }
  return { address: request.target.address, name: request.target.name }
}

function orchestrator(ctx: CommandContext): PipelineOrchestrator {
  return new PipelineOrchestrator({
    client: ctx.client,
    llm: ctx.llm,
    cache: ctx.cache,
    settings: ctx.config,
    runId: ctx.runId,
    logger: ctx.logger,
  })
}

async function execute(request: CommandRequest, ctx: CommandContext): Promise<AgentResult> {
  const pipeline = orchestrator(ctx)

  switch (request.command) {
    case 'discover-entries': {
      const discovery = await pipeline.discoverEntries()
      const data = discovery.callers.map(serializeCaller)
      return {
        success: true,
        summary: discovery.entryFound
          ? buildItemSummary(data, caller => caller.func_name, `routine(s) reference ${ctx.config.entrySymbol}`)
          : `Entry not found: ${ctx.config.entrySymbol} is not imported`,
        data,
      }
    }

    case 'resolve-dispatch-target': {
      const caller = requireTarget(request)
      const resolution = await pipeline.dispatch.resolve(caller, await pipeline.decompile(caller))
      if (ctx.config.annotateDispatch) {
        await pipeline.annotator.annotate(resolution.target, await pipeline.decompile(resolution.target))
      }
      return {
        success: true,
        summary: `${caller.name} -> ${resolution.target.name} (${resolution.method})`,
        data: { address: formatAddress(resolution.target.address), func_name: resolution.target.name },
      }
    }

    case 'list-subfunctions': {
      const entries = await pipeline.listSubfunctions(requireTarget(request))
      const data = entries.map(entry => ({ address: formatAddress(entry.address), name: entry.name, type: entry.kind }))
      return { success: true, summary: buildItemSummary(data, entry => entry.name, 'subfunction(s)'), data }
    }

    case 'describe-external': {
      const target = requireTarget(request)
      const markdown = await pipeline.summarizer.describeExternal(target.name, target.address)
      return { success: true, summary: `Described ${target.name}`, data: markdown }
    }

    case 'describe-internal': {
      const target = requireTarget(request)
      const description = await pipeline.summarizer.describeInternal(target, await pipeline.decompile(target))
      const annotations = [...description.annotations].sort()
      return {
        success: true,
        summary: `Described ${target.name}${annotations.length ? ` [${annotations.join(', ')}]` : ''}`,
        data: { markdown: description.markdown, annotations },
      }
    }

    case 'analyze-memory-parameters': {
      const target = requireTarget(request)
      const outcome = await pipeline.memoryParams.analyze(target, await pipeline.decompile(target))
      const findings = findingsOf(outcome)
      return {
        success: true,
        summary:
          outcome.status === 'parsed'
            ? buildItemSummary(findings, finding => `${finding.parameter}:${finding.operation}`, 'memory parameter use(s)')
            : 'Memory parameter reply did not parse',
        data: {
          function: { name: target.name, address: formatAddress(target.address) },
          status: outcome.status,
          has_memory_address_param: findings.length > 0,
          memory_parameters: findings.map(finding => ({
            param: finding.parameter,
            operation: finding.operation,
            description: finding.description,
            evidence: finding.evidence,
          })),
          markdown: renderMemoryParameters(outcome),
          ...(outcome.status === 'parse_failed' ? { rawText: outcome.rawText } : {}),
        },
      }
    }

    case 'analyze-memory-flow': {
      const target = requireTarget(request)
      const result = await pipeline.memoryFlow.trace(target, await pipeline.decompile(target))
      return {
        success: true,
        summary: result.note ?? `${result.paths.length} confirmed path(s)`,
        data: {
          status: result.outcome.status,
          paths: result.paths.map(path => ({
            hops: path.hops.map(hop => ({
              function: { name: hop.function.name, address: formatAddress(hop.function.address) },
              parameter: hop.parameter,
            })),
            operation: path.operation,
            evidence: path.evidence,
          })),
          rejected: result.rejected,
          markdown: renderMemoryFlow(result),
        },
      }
    }

    case 'analyze-irp-access': {
      const target = requireTarget(request)
      const context = request.contextPath ? await readFile(request.contextPath, 'utf-8') : undefined
      const outcome = await pipeline.irpAccess.analyze(target, await pipeline.decompile(target), context)
      return {
        success: true,
        summary:
          outcome.status === 'parsed'
            ? outcome.value.controllable
              ? `${outcome.value.accesses.length} IRP-controlled access(es)`
              : 'No IRP-controlled memory access'
            : 'IRP access reply did not parse',
        data: {
          status: outcome.status,
          ...(outcome.status === 'parsed' ? outcome.value : { rawText: outcome.rawText }),
          markdown: renderIrpAccess(outcome),
        },
      }
    }

    case 'run-full-pipeline': {
      const run = await pipeline.run()
      const reportPath = await writeReport(run.markdown, ctx.config.reportDir, run.report.generatedAt)
      return {
        success: true,
        summary: `Report written to ${reportPath}`,
        data: {
          reportPath,
          targets: run.report.targets.map(target => ({
            address: formatAddress(target.target.address),
            func_name: target.target.name,
          })),
          unresolved: run.report.unresolved.map(({ caller, reason }) => ({ ...serializeCaller(caller), reason })),
          skipped: run.report.skipped.map(({ address, reason }) => ({ address: formatAddress(address), reason })),
          states: run.states,
        },
      }
    }

    case 'compact-cache': {
      const counts = await ctx.cache.compact()
      return { success: true, summary: `Cache compacted: ${counts.before} -> ${counts.after} records`, data: counts }
    }
  }
}

/**
 * Run one command; errors become an unsuccessful result
 */
export async function runHeadless(request: CommandRequest, ctx: CommandContext): Promise<HeadlessResult> {
  const startTime = Date.now()

  try {
    const result = await execute(request, ctx)
    return {
      ...result,
      command: request.command,
      runId: ctx.runId,
      duration: (Date.now() - startTime) / 1000,
    }
  } catch (error) {
    ctx.logger.error(error, `${request.command} failed`)
    return {
      success: false,
      summary: `${request.command} failed`,
      command: request.command,
      runId: ctx.runId,
      error: errorMessage(error),
      ...(isTriageError(error) ? { errorKind: error.kind } : {}),
      duration: (Date.now() - startTime) / 1000,
    }
  }
}
