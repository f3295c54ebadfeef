/**
 * Analysis data model shared by the client, analyzers and the pipeline.
 *
 * Addresses are plain numbers internally (64-bit driver addresses stay well
 * below 2^53) and hex strings only at the wire / JSON boundary.
 */

export interface FunctionRef {
  address: number
  /** Cosmetic; may be a backend placeholder such as sub_11170 */
  name: string
}

export interface ImportEntry {
  name: string
  address: number
}

export type SubfunctionKind = 'internal' | 'external'

export interface SubfunctionEntry {
  address: number
  name: string
  kind: SubfunctionKind
}

/** A reference to the entry symbol and the routine that contains it */
export interface CallerRef {
  callSite: number
  function: FunctionRef
}

export type DescriptionAnnotation = 'MEM' | 'MAP'

export interface FunctionDescription {
  markdown: string
  annotations: Set<DescriptionAnnotation>
}

export type MemoryOperation = 'read' | 'write' | 'copy'

export interface MemoryParameterFinding {
  parameter: string
  operation: MemoryOperation
  description: string
  /** Verbatim pseudocode line */
  evidence: string
}

export interface FlowHop {
  function: FunctionRef
  parameter: string
}

export interface MemoryFlowPath {
  hops: FlowHop[]
  operation: MemoryOperation
  evidence: string
}

export interface CacheEntry {
  key: string
  markdown: string
  iatAddresses: Set<number>
}

export type PointerRole = 'source' | 'destination' | 'other'

export interface IrpAccessFinding {
  operation: string
  role: PointerRole
  pointerSource: string
  ioControlCode?: string
  note: string
}

export interface IrpAccessResult {
  controllable: boolean
  accesses: IrpAccessFinding[]
}

/**
 * Free text turned into structure either parses or it doesn't; both are
 * normal outcomes that callers must handle.
 */
export type ParseOutcome<T> =
  | { status: 'parsed'; value: T }
  | { status: 'parse_failed'; rawText: string }

export function parsedOk<T>(value: T): ParseOutcome<T> {
  return { status: 'parsed', value }
}

export function parseFailed<T>(rawText: string): ParseOutcome<T> {
  return { status: 'parse_failed', rawText }
}

export function findingsOf(outcome: ParseOutcome<MemoryParameterFinding[]>): MemoryParameterFinding[] {
  return outcome.status === 'parsed' ? outcome.value : []
}
