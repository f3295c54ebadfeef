/**
 * Triage report model and Markdown rendering
 */

import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import { renderIrpAccess } from '../agents/irp-access-agent'
import { renderMemoryFlow, type MemoryFlowResult } from '../agents/memory-flow-agent'
import { renderMemoryParameters } from '../agents/memory-param-agent'
import type { ResolutionMethod } from '../agents/dispatch-resolver'
import type {
  CallerRef,
  DescriptionAnnotation,
  FunctionRef,
  IrpAccessResult,
  MemoryParameterFinding,
  ParseOutcome,
  SubfunctionEntry,
} from '../types/analysis'
import { parsedOk } from '../types/analysis'
import { formatAddress } from '../utils/address'

export interface SubfunctionReport {
  entry: SubfunctionEntry
  /** Absent when describing failed; see `note` */
  description?: string
  annotations: DescriptionAnnotation[]
  /** Present for MEM/MAP-annotated internal routines */
  memoryFindings?: ParseOutcome<MemoryParameterFinding[]>
  note?: string
}

export interface ResolvedCaller {
  caller: CallerRef
  method: ResolutionMethod
}

/** Result of one analysis step, or why it produced nothing */
export type StepResult<T> = { ok: true; value: T } | { ok: false; note: string }

export interface TargetReport {
  target: FunctionRef
  callers: ResolvedCaller[]
  annotationNotes: string[]
  subfunctions: SubfunctionReport[]
  subfunctionNote?: string
  memory: StepResult<ParseOutcome<MemoryParameterFinding[]>>
  flow: StepResult<MemoryFlowResult>
  irpAccess: StepResult<ParseOutcome<IrpAccessResult>>
}

export interface UnresolvedCaller {
  caller: CallerRef
  reason: string
}

/** An entry reference or call site discovery could not follow */
export interface SkippedReference {
  address: number
  reason: string
}

export interface TriageReport {
  runId: string
  generatedAt: Date
  entrySymbol: string
  entryFound: boolean
  callers: CallerRef[]
  skipped: SkippedReference[]
  targets: TargetReport[]
  unresolved: UnresolvedCaller[]
  /** Absent when there was no handler to reason about */
  deepReasoning?: StepResult<string>
}

/** A routine with memory parameter findings */
export interface MemorySection {
  function: FunctionRef
  findings: MemoryParameterFinding[]
}

const MAX_HEADING = 6

/**
 * Push Markdown headings `levels` deeper, leaving fenced code alone
 */
export function demoteHeadings(markdown: string, levels: number): string {
  let inFence = false
  return markdown
    .split('\n')
    .map(line => {
      if (/^\s*(```|~~~)/.test(line)) {
        inFence = !inFence
        return line
      }
      if (inFence) return line

      const heading = /^(#{1,6})\s+(.*)$/.exec(line)
      if (!heading) return line
      const depth = Math.min(heading[1].length + levels, MAX_HEADING)
      return `${'#'.repeat(depth)} ${heading[2]}`
    })
    .join('\n')
}

function label(fn: FunctionRef): string {
  return `${fn.name} (${formatAddress(fn.address)})`
}

function stepBody<T>(step: StepResult<T>, render: (value: T) => string): string {
  return step.ok ? render(step.value) : `_${step.note}_`
}

function renderSubfunction(sub: SubfunctionReport): string {
  const lines = [`#### ${label(sub.entry)} · ${sub.entry.kind}`, '']

  if (sub.description !== undefined) {
    lines.push(demoteHeadings(sub.description, 4))
  } else {
    lines.push(`_${sub.note ?? 'No description.'}_`)
  }

  if (sub.annotations.length > 0) {
    lines.push('', `Annotations: ${sub.annotations.join(', ')}`)
  }

  if (sub.memoryFindings) {
    lines.push('', '##### Memory parameters', '', renderMemoryParameters(sub.memoryFindings))
  } else if (sub.description !== undefined && sub.note) {
    lines.push('', `_${sub.note}_`)
  }

  return lines.join('\n')
}

/**
 * Callee descriptions and target findings handed to the IRP access prompt
 */
export function renderSubfunctionContext(subfunctions: SubfunctionReport[]): string {
  return subfunctions
    .filter(sub => sub.description !== undefined)
    .map(renderSubfunction)
    .join('\n\n')
}

/**
 * Every routine with memory parameter findings, callees before their
 * handler, each routine once
 */
export function memoryParameterSections(targets: TargetReport[]): MemorySection[] {
  const sections: Map<number, MemorySection> = new Map()
  const add = (fn: FunctionRef, outcome: ParseOutcome<MemoryParameterFinding[]> | undefined) => {
    if (outcome?.status !== 'parsed' || outcome.value.length === 0 || sections.has(fn.address)) return
    sections.set(fn.address, { function: { address: fn.address, name: fn.name }, findings: outcome.value })
  }

  for (const target of targets) {
    for (const sub of target.subfunctions) {
      add(sub.entry, sub.memoryFindings)
    }
    add(target.target, target.memory.ok ? target.memory.value : undefined)
  }
  return [...sections.values()]
}

export function renderMemorySection(section: MemorySection): string {
  return [`### ${label(section.function)}`, '', renderMemoryParameters(parsedOk(section.findings))].join('\n')
}

function renderTarget(target: TargetReport): string {
  const sections: string[] = [`## Dispatch handler ${label(target.target)}`]

  const callerRows = target.callers.map(
    ({ caller, method }) =>
      `| ${label(caller.function)} | ${formatAddress(caller.callSite)} | ${method === 'pattern' ? 'pseudocode match' : 'LLM'} |`
  )
  const resolution = [
    '### Caller resolution',
    '',
    '| Caller | Call site | Resolved by |',
    '| --- | --- | --- |',
    ...callerRows,
  ]
  if (target.annotationNotes.length > 0) {
    resolution.push('', ...target.annotationNotes.map(note => `- ${note}`))
  }
  sections.push(resolution.join('\n'))

  const subfunctions = ['### Subfunctions', '']
  if (target.subfunctionNote) {
    subfunctions.push(`_${target.subfunctionNote}_`)
  } else if (target.subfunctions.length === 0) {
    subfunctions.push('No direct callees.')
  } else {
    subfunctions.push(target.subfunctions.map(renderSubfunction).join('\n\n'))
  }
  sections.push(subfunctions.join('\n'))

  sections.push(['### Memory parameters', '', stepBody(target.memory, renderMemoryParameters)].join('\n'))
  sections.push(['### Memory flow', '', stepBody(target.flow, renderMemoryFlow)].join('\n'))
  sections.push(['### IRP-controlled access', '', stepBody(target.irpAccess, renderIrpAccess)].join('\n'))

  return sections.join('\n\n')
}

export function renderReport(report: TriageReport): string {
  const parts: string[] = [
    [
      '# Driver triage report',
      '',
      `- Run: \`${report.runId}\``,
      `- Generated: ${report.generatedAt.toISOString()}`,
      `- Entry symbol: \`${report.entrySymbol}\``,
      `- Dispatch handlers: ${report.targets.length}`,
    ].join('\n'),
  ]

  if (!report.entryFound) {
    parts.push(`Entry not found: \`${report.entrySymbol}\` is not in the import table.`)
  } else if (report.callers.length === 0) {
    parts.push(`No routine references \`${report.entrySymbol}\`.`)
  }

  for (const target of report.targets) {
    parts.push(renderTarget(target))
  }

  if (report.unresolved.length > 0) {
    const rows = report.unresolved.map(
      ({ caller, reason }) => `- ${label(caller.function)}, call at ${formatAddress(caller.callSite)}: ${reason}`
    )
    parts.push(['## Unresolved callers', '', ...rows].join('\n'))
  }

  if (report.skipped.length > 0) {
    const rows = report.skipped.map(({ address, reason }) => `- ${formatAddress(address)}: ${reason}`)
    parts.push(['## Skipped references', '', ...rows].join('\n'))
  }

  if (report.deepReasoning) {
    parts.push(['## Deep reasoning', '', stepBody(report.deepReasoning, body => demoteHeadings(body, 2))].join('\n'))
  }

  const memory = memoryParameterSections(report.targets)
  if (memory.length > 0) {
    parts.push(['## Memory parameter summary', '', memory.map(renderMemorySection).join('\n\n')].join('\n'))
  }

  return parts.join('\n\n') + '\n'
}

/**
 * Write `<dir>/<unix-seconds>.md` and return its path
 */
export async function writeReport(markdown: string, dir: string, now: Date = new Date()): Promise<string> {
  await mkdir(dir, { recursive: true })
  const path = join(dir, `${Math.floor(now.getTime() / 1000)}.md`)
  await writeFile(path, markdown, 'utf-8')
  return path
}
