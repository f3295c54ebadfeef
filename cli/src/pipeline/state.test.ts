import { describe, expect, it, vi } from 'vitest'
import { IllegalTransitionError, PipelineStateMachine, canTransition } from './state'

describe('PipelineStateMachine', () => {
  it('walks a run with two targets', () => {
    const listener = vi.fn()
    const machine = new PipelineStateMachine(listener)
    const perTarget = ['ENUMERATE_SUBFUNCTIONS', 'DESCRIBE_EACH', 'ANALYZE_TARGET_MEMORY', 'ANALYZE_TARGET_FLOW', 'ANALYZE_IRP_ACCESS'] as const

    machine.transition('RESOLVE_DISPATCH')
    perTarget.forEach(state => machine.transition(state))
    perTarget.forEach(state => machine.transition(state))
    machine.transition('ASSEMBLE_REPORT')
    machine.transition('DONE')

    expect(machine.state).toBe('DONE')
    expect(machine.history).toHaveLength(14)
    expect(listener).toHaveBeenCalledWith('DISCOVER_ENTRY', 'RESOLVE_DISPATCH')
  })

  it('goes straight to the report when nothing was discovered', () => {
    const machine = new PipelineStateMachine()
    machine.transition('ASSEMBLE_REPORT')
    machine.transition('DONE')
    expect(machine.history).toEqual(['DISCOVER_ENTRY', 'ASSEMBLE_REPORT', 'DONE'])
  })

  it('rejects skipped states', () => {
    const machine = new PipelineStateMachine()
    expect(() => machine.transition('DESCRIBE_EACH')).toThrow(IllegalTransitionError)
    expect(() => machine.transition('DESCRIBE_EACH')).toThrow('Illegal pipeline transition DISCOVER_ENTRY -> DESCRIBE_EACH')
  })

  it('fails from any non-terminal state and stays terminal', () => {
    const machine = new PipelineStateMachine()
    machine.transition('RESOLVE_DISPATCH')
    machine.fail()
    machine.fail()
    expect(machine.history).toEqual(['DISCOVER_ENTRY', 'RESOLVE_DISPATCH', 'FAILED'])
    expect(canTransition('DONE', 'FAILED')).toBe(false)
    expect(() => machine.transition('ASSEMBLE_REPORT')).toThrow(IllegalTransitionError)
  })
})
