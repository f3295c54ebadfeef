/**
 * Pipeline state machine
 *
 * The target-scoped states repeat once per dispatch target:
 * ENUMERATE_SUBFUNCTIONS → DESCRIBE_EACH → ANALYZE_TARGET_MEMORY →
 * ANALYZE_TARGET_FLOW → ANALYZE_IRP_ACCESS.
 */

export const PIPELINE_STATES = [
  'DISCOVER_ENTRY',
  'RESOLVE_DISPATCH',
  'ENUMERATE_SUBFUNCTIONS',
  'DESCRIBE_EACH',
  'ANALYZE_TARGET_MEMORY',
  'ANALYZE_TARGET_FLOW',
  'ANALYZE_IRP_ACCESS',
  'ASSEMBLE_REPORT',
  'DONE',
  'FAILED',
] as const

export type PipelineState = (typeof PIPELINE_STATES)[number]

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  // Straight to the report when the entry symbol or its callers are missing
  DISCOVER_ENTRY: ['RESOLVE_DISPATCH', 'ASSEMBLE_REPORT'],
  RESOLVE_DISPATCH: ['ENUMERATE_SUBFUNCTIONS', 'ASSEMBLE_REPORT'],
  ENUMERATE_SUBFUNCTIONS: ['DESCRIBE_EACH'],
  DESCRIBE_EACH: ['ANALYZE_TARGET_MEMORY'],
  ANALYZE_TARGET_MEMORY: ['ANALYZE_TARGET_FLOW'],
  ANALYZE_TARGET_FLOW: ['ANALYZE_IRP_ACCESS'],
  ANALYZE_IRP_ACCESS: ['ENUMERATE_SUBFUNCTIONS', 'ASSEMBLE_REPORT'],
  ASSEMBLE_REPORT: ['DONE'],
  DONE: [],
  FAILED: [],
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: PipelineState,
    readonly to: PipelineState
  ) {
    super(`Illegal pipeline transition ${from} -> ${to}`)
    this.name = 'IllegalTransitionError'
  }
}

export function isTerminal(state: PipelineState): boolean {
  return state === 'DONE' || state === 'FAILED'
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  if (to === 'FAILED') return !isTerminal(from)
  return TRANSITIONS[from].includes(to)
}

export type TransitionListener = (from: PipelineState, to: PipelineState) => void

export class PipelineStateMachine {
  private current: PipelineState = 'DISCOVER_ENTRY'
  private readonly visited: PipelineState[] = ['DISCOVER_ENTRY']

  constructor(private readonly onTransition?: TransitionListener) {}

  get state(): PipelineState {
    return this.current
  }

  /** Every state entered, in order */
  get history(): readonly PipelineState[] {
    return this.visited
  }

  transition(to: PipelineState): void {
    const from = this.current
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(from, to)
    }
    this.current = to
    this.visited.push(to)
    this.onTransition?.(from, to)
  }

  /** Enter FAILED unless already terminal */
  fail(): void {
    if (!isTerminal(this.current)) {
      this.transition('FAILED')
    }
  }
}
