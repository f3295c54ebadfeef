/**
 * Pipeline Orchestrator
 *
 * Drives one triage run over the state machine:
 * discover callers of the entry symbol, resolve their dispatch handler, then
 * per handler describe its callees and analyze the handler itself.
 * Per-unit failures become notes in the report; a lost backend fails the run.
 */

import { DeepReasoningAnalyzer, type HandlerFindings } from '../agents/deep-reasoning-agent'
import { DispatchAnnotator } from '../agents/dispatch-annotator'
import { DispatchResolver, type DispatchResolution } from '../agents/dispatch-resolver'
import { IrpAccessAnalyzer, renderIrpAccess } from '../agents/irp-access-agent'
import { FindingsIndex, MemoryFlowAnalyzer } from '../agents/memory-flow-agent'
import { MemoryParameterAnalyzer, renderMemoryParameters } from '../agents/memory-param-agent'
import { Summarizer } from '../agents/summarizer'
import type { BinaryAnalysisClient } from '../services/binary-analysis'
import type { CacheStore } from '../services/cache-store'
import type { LlmClient } from '../services/llm'
import type { CallerRef, FunctionRef, ImportEntry, SubfunctionEntry } from '../types/analysis'
import { formatAddress } from '../utils/address'
import { mapWithConcurrency } from '../utils/concurrency'
import { EntryNotFoundError, errorMessage, isFatal, isTriageError } from '../utils/errors'
import { silentLogger, type Logger } from '../utils/logger'
import type { TriageConfig } from '../utils/user-config'
import {
  memoryParameterSections,
  renderMemorySection,
  renderReport,
  renderSubfunctionContext,
  type ResolvedCaller,
  type SkippedReference,
  type StepResult,
  type SubfunctionReport,
  type TargetReport,
  type TriageReport,
  type UnresolvedCaller,
} from './report'
import { PipelineStateMachine, type PipelineState } from './state'

export type PipelineSettings = Pick<TriageConfig, 'entrySymbol' | 'concurrency' | 'annotateDispatch' | 'dispatchSlot'>

export interface PipelineDeps {
  client: BinaryAnalysisClient
  llm: LlmClient
  cache: CacheStore
  settings: PipelineSettings
  runId: string
  logger?: Logger
}

export interface DiscoveryResult {
  entryFound: boolean
  callers: CallerRef[]
  /** References that could not be followed; discovery went on without them */
  skipped: SkippedReference[]
}

export interface DispatchGroup {
  target: FunctionRef
  callers: ResolvedCaller[]
}

export interface DispatchResult {
  groups: DispatchGroup[]
  unresolved: UnresolvedCaller[]
}

export interface PipelineRun {
  report: TriageReport
  markdown: string
  states: readonly PipelineState[]
}

/** Unit-boundary shape of a discovered caller */
export function serializeCaller(caller: CallerRef): { address: string; func_name: string } {
  return { address: formatAddress(caller.callSite), func_name: caller.function.name }
}

export class PipelineOrchestrator {
  readonly summarizer: Summarizer
  readonly memoryParams: MemoryParameterAnalyzer
  readonly memoryFlow: MemoryFlowAnalyzer
  readonly dispatch: DispatchResolver
  readonly irpAccess: IrpAccessAnalyzer
  readonly annotator: DispatchAnnotator
  readonly deepReasoning: DeepReasoningAnalyzer

  private readonly logger: Logger
  private readonly findings: FindingsIndex
  private importsPromise: Promise<ImportEntry[]> | null = null
  private readonly pseudocode: Map<number, Promise<string>> = new Map()

  constructor(private readonly deps: PipelineDeps) {
    const logger = deps.logger ?? silentLogger
    const { client, llm, cache } = deps
    this.logger = logger

    this.summarizer = new Summarizer({ llm, cache, logger })
    this.memoryParams = new MemoryParameterAnalyzer({ llm, logger })
    this.findings = new FindingsIndex(client, this.memoryParams)
    this.memoryFlow = new MemoryFlowAnalyzer({ llm, logger, findings: this.findings })
    this.dispatch = new DispatchResolver({ llm, logger, client, slot: deps.settings.dispatchSlot })
    this.irpAccess = new IrpAccessAnalyzer({ llm, logger })
    this.annotator = new DispatchAnnotator({ client, logger })
    this.deepReasoning = new DeepReasoningAnalyzer({ llm, logger })
  }

  /**
   * Import table, fetched once per orchestrator
   */
  imports(): Promise<ImportEntry[]> {
    if (!this.importsPromise) {
      this.importsPromise = this.deps.client.listImports()
    }
    return this.importsPromise
  }

  /**
   * Pseudocode, decompiled once per function
   */
  decompile(fn: FunctionRef): Promise<string> {
    const known = this.pseudocode.get(fn.address)
    if (known) return known
    const pending = this.deps.client.decompile(fn)
    this.pseudocode.set(fn.address, pending)
    return pending
  }

  /**
   * Import entries matching the entry symbol, case-insensitively
   */
  async entryImports(): Promise<ImportEntry[]> {
    const symbol = this.deps.settings.entrySymbol
    const entries = (await this.imports()).filter(entry => entry.name.toLowerCase() === symbol.toLowerCase())
    if (entries.length === 0) {
      throw new EntryNotFoundError(symbol)
    }
    return entries
  }

  /**
   * Routines that reference the entry symbol, one per function,
   * ordered by call site
   */
  async discoverEntries(): Promise<DiscoveryResult> {
    const { client, settings } = this.deps
    let entries: ImportEntry[]
    try {
      entries = await this.entryImports()
    } catch (err) {
      if (isTriageError(err, 'EntryNotFound')) {
        this.logger.warn({ symbol: settings.entrySymbol }, err.message)
        return { entryFound: false, callers: [], skipped: [] }
      }
      throw err
    }

    const skipped: SkippedReference[] = []
    const skip = (address: number, err: unknown, what: string) => {
      if (isFatal(err)) throw err
      this.logger.warn({ address: formatAddress(address), error: errorMessage(err) }, what)
      skipped.push({ address, reason: `${what}: ${errorMessage(err)}` })
    }

    const callSites: number[] = []
    for (const entry of entries) {
      try {
        callSites.push(...(await client.xrefsTo(entry.address)))
      } catch (err) {
        skip(entry.address, err, `References to ${entry.name} unavailable`)
      }
    }
    callSites.sort((a, b) => a - b)

    const byFunction: Map<number, CallerRef> = new Map()
    for (const callSite of callSites) {
      let fn: FunctionRef
      try {
        fn = await client.functionContaining(callSite)
      } catch (err) {
        if (isTriageError(err, 'NotFound')) {
          this.logger.debug({ callSite: formatAddress(callSite) }, 'reference outside any function')
        } else {
          skip(callSite, err, 'Containing function unavailable')
        }
        continue
      }
      if (!byFunction.has(fn.address)) {
        byFunction.set(fn.address, { callSite, function: fn })
      }
    }

    const callers = [...byFunction.values()]
    this.logger.info({ symbol: settings.entrySymbol, callers: callers.length }, 'entry references discovered')
    return { entryFound: true, callers, skipped }
  }

  /**
   * Resolve every caller's handler; callers sharing a handler are grouped
   */
  async resolveDispatch(callers: CallerRef[]): Promise<DispatchResult> {
    const outcomes = await mapWithConcurrency(callers, this.deps.settings.concurrency, async (caller): Promise<{ caller: CallerRef; resolution: DispatchResolution } | UnresolvedCaller> => {
      try {
        const resolution = await this.dispatch.resolve(caller.function, await this.decompile(caller.function))
        return { caller, resolution }
      } catch (err) {
        if (isFatal(err)) throw err
        this.logger.warn(errorMessage(err), `dispatch of ${caller.function.name} not resolved`)
        return { caller, reason: errorMessage(err) }
      }
    })

    const groups: Map<number, DispatchGroup> = new Map()
    const unresolved: UnresolvedCaller[] = []
    for (const outcome of outcomes) {
      if (!('resolution' in outcome)) {
        unresolved.push(outcome)
        continue
      }
      const { caller, resolution } = outcome
      const resolved: ResolvedCaller = { caller, method: resolution.method }
      const group = groups.get(resolution.target.address)
      if (group) {
        group.callers.push(resolved)
      } else {
        groups.set(resolution.target.address, { target: resolution.target, callers: [resolved] })
      }
    }

    return { groups: [...groups.values()], unresolved }
  }

  /**
   * Direct callees, deduplicated by address and classified by import-table
   * membership only
   */
  async listSubfunctions(fn: FunctionRef): Promise<SubfunctionEntry[]> {
    const [callees, imports] = await Promise.all([this.deps.client.callees(fn), this.imports()])
    const imported = new Set(imports.map(entry => entry.address))

    const seen = new Set<number>()
    const entries: SubfunctionEntry[] = []
    for (const callee of callees) {
      if (seen.has(callee.address)) continue
      seen.add(callee.address)
      entries.push({
        address: callee.address,
        name: callee.name,
        kind: imported.has(callee.address) ? 'external' : 'internal',
      })
    }
    return entries
  }

  /**
   * Describe one callee; MEM/MAP-annotated internal routines also get their
   * memory parameters analyzed
   */
  async describeSubfunction(entry: SubfunctionEntry): Promise<SubfunctionReport> {
    try {
      if (entry.kind === 'external') {
        const description = await this.summarizer.describeExternal(entry.name, entry.address)
        return { entry, description, annotations: [] }
      }

      const pseudocode = await this.decompile(entry)
      const described = await this.summarizer.describeInternal(entry, pseudocode)
      const report: SubfunctionReport = {
        entry,
        description: described.markdown,
        annotations: [...described.annotations].sort(),
      }

      if (described.annotations.size > 0) {
        try {
          const findings = await this.memoryParams.analyze(entry, pseudocode)
          this.findings.seed(entry, findings)
          report.memoryFindings = findings
        } catch (err) {
          if (isFatal(err)) throw err
          report.note = `Memory parameter analysis failed: ${errorMessage(err)}`
        }
      }
      return report
    } catch (err) {
      if (isFatal(err)) throw err
      this.logger.warn(errorMessage(err), `cannot describe ${entry.name}`)
      return { entry, annotations: [], note: `Description unavailable: ${errorMessage(err)}` }
    }
  }

  /**
   * Sections (b) through (e) for one handler
   */
  async analyzeTarget(
    group: DispatchGroup,
    machine: PipelineStateMachine,
    annotationNotes: string[]
  ): Promise<TargetReport> {
    const { target } = group
    const { concurrency } = this.deps.settings

    machine.transition('ENUMERATE_SUBFUNCTIONS')
    let entries: SubfunctionEntry[] = []
    let subfunctionNote: string | undefined
    try {
      entries = await this.listSubfunctions(target)
    } catch (err) {
      if (isFatal(err)) throw err
      subfunctionNote = `Callees unavailable: ${errorMessage(err)}`
    }

    machine.transition('DESCRIBE_EACH')
    const subfunctions = await mapWithConcurrency(entries, concurrency, entry => this.describeSubfunction(entry))

    let pseudocode: string | null = null
    let decompileNote = ''
    try {
      pseudocode = await this.decompile(target)
    } catch (err) {
      if (isFatal(err)) throw err
      decompileNote = `Handler could not be decompiled: ${errorMessage(err)}`
    }

    machine.transition('ANALYZE_TARGET_MEMORY')
    const memory = await this.step(pseudocode, decompileNote, 'Memory parameter analysis failed', async code => {
      const outcome = await this.memoryParams.analyze(target, code)
      this.findings.seed(target, outcome)
      return outcome
    })

    machine.transition('ANALYZE_TARGET_FLOW')
    const flow = await this.step(pseudocode, decompileNote, 'Memory flow analysis failed', code =>
      this.memoryFlow.trace(target, code)
    )

    machine.transition('ANALYZE_IRP_ACCESS')
    const context = [
      renderSubfunctionContext(subfunctions),
      memory.ok ? `### ${target.name} memory parameters\n\n${renderMemoryParameters(memory.value)}` : '',
    ]
      .filter(Boolean)
      .join('\n\n')
    const irpAccess = await this.step(pseudocode, decompileNote, 'IRP access analysis failed', code =>
      this.irpAccess.analyze(target, code, context || undefined)
    )

    return {
      target,
      callers: group.callers,
      annotationNotes,
      subfunctions,
      subfunctionNote,
      memory,
      flow,
      irpAccess,
    }
  }

  /**
   * Full run; throws (after entering FAILED) only when the backend is lost
   */
  async run(): Promise<PipelineRun> {
    const machine = new PipelineStateMachine((from, to) => this.logger.debug({ from, to }, 'pipeline transition'))
    const report: TriageReport = {
      runId: this.deps.runId,
      generatedAt: new Date(),
      entrySymbol: this.deps.settings.entrySymbol,
      entryFound: false,
      callers: [],
      skipped: [],
      targets: [],
      unresolved: [],
    }

    try {
      const discovery = await this.discoverEntries()
      report.entryFound = discovery.entryFound
      report.callers = discovery.callers
      report.skipped = discovery.skipped

      if (discovery.callers.length > 0) {
        machine.transition('RESOLVE_DISPATCH')
        const dispatch = await this.resolveDispatch(discovery.callers)
        report.unresolved = dispatch.unresolved

        for (const group of dispatch.groups) {
          const annotationNotes = this.deps.settings.annotateDispatch ? await this.annotate(group.target) : []
          report.targets.push(await this.analyzeTarget(group, machine, annotationNotes))
        }
      }

      machine.transition('ASSEMBLE_REPORT')
      if (report.targets.length > 0) {
        report.deepReasoning = await this.reasonAcross(report.targets)
      }
      const markdown = renderReport(report)
      machine.transition('DONE')

      this.logger.info(
        { runId: this.deps.runId, targets: report.targets.length, unresolved: report.unresolved.length },
        'pipeline finished'
      )
      return { report, markdown, states: machine.history }
    } catch (err) {
      const failedIn = machine.state
      machine.fail()
      this.logger.error(err, `pipeline failed in ${failedIn}`)
      throw err
    }
  }

  /**
   * Closing pass over every handler's findings
   */
  async reasonAcross(targets: TargetReport[]): Promise<StepResult<string>> {
    const handlers: HandlerFindings[] = targets.map(target => ({
      target: target.target,
      memoryParameters: target.memory.ok ? renderMemoryParameters(target.memory.value) : `_${target.memory.note}_`,
      irpAccess: target.irpAccess.ok ? renderIrpAccess(target.irpAccess.value) : `_${target.irpAccess.note}_`,
    }))
    const memorySections = memoryParameterSections(targets).map(renderMemorySection)

    try {
      return { ok: true, value: await this.deepReasoning.analyze({ handlers, memorySections }) }
    } catch (err) {
      if (isFatal(err)) throw err
      this.logger.warn(errorMessage(err), 'deep reasoning failed')
      return { ok: false, note: `Deep reasoning unavailable: ${errorMessage(err)}` }
    }
  }

  private async annotate(target: FunctionRef): Promise<string[]> {
    try {
      const result = await this.annotator.annotate(target, await this.decompile(target))
      // Renamed locals show up in later pseudocode
      this.pseudocode.delete(target.address)
      return result.notes
    } catch (err) {
      if (isFatal(err)) throw err
      return [`Annotation skipped: ${errorMessage(err)}`]
    }
  }

  private async step<T>(
    pseudocode: string | null,
    unavailableNote: string,
    failurePrefix: string,
    run: (pseudocode: string) => Promise<T>
  ): Promise<StepResult<T>> {
    if (pseudocode === null) {
      return { ok: false, note: unavailableNote }
    }
    try {
      return { ok: true, value: await run(pseudocode) }
    } catch (err) {
      if (isFatal(err)) throw err
      this.logger.warn(errorMessage(err), failurePrefix)
      return { ok: false, note: `${failurePrefix}: ${errorMessage(err)}` }
    }
  }
}
