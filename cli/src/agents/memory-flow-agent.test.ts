import { describe, expect, it } from 'vitest'
import { BinaryAnalysisClient } from '../services/binary-analysis'
import { LlmClient } from '../services/llm'
import { FakeLlm, fakeIda } from '../test-utils/fakes'
import { FindingsIndex, MemoryFlowAnalyzer, renderMemoryFlow } from './memory-flow-agent'
import { MemoryParameterAnalyzer } from './memory-param-agent'

const handler = { address: 0x11170, name: 'sub_11170' }
const handlerCode = 'NTSTATUS sub_11170(PIRP a1, void *a2) { sub_11460(a2, 16); sub_11500(a1); }'

const ida = fakeIda({
  imports: [],
  functions: [
    { address: 0x11170, name: 'sub_11170', size: 0x100, pseudocode: handlerCode },
    { address: 0x11460, name: 'sub_11460', size: 0x40, pseudocode: 'void sub_11460(void *a1, int a2) { memset(a1, 0, a2); }' },
    { address: 0x11500, name: 'sub_11500', size: 0x40, pseudocode: 'void sub_11500(PIRP a1) { IofCompleteRequest(a1, 0); }' },
  ],
})

const findingsByFunction: Record<string, string> = {
  sub_11460: JSON.stringify({
    has_memory_address_param: true,
    memory_parameters: [{ param: 'A1', operation: 'write', description: 'zeroed', evidence: 'memset(a1, 0, a2);' }],
  }),
  sub_11500: JSON.stringify({ has_memory_address_param: false, memory_parameters: [] }),
  sub_11170: JSON.stringify({ has_memory_address_param: false, memory_parameters: [] }),
}

function setup(flowReply: string) {
  const backend = new FakeLlm(prompt => {
    if (prompt.includes('trace how its parameters')) return flowReply
    const name = Object.keys(findingsByFunction).find(candidate => prompt.startsWith(`Analyze ${candidate} `))
    return name ? findingsByFunction[name] : '{}'
  })
  const llm = new LlmClient(backend, { timeoutMs: 1000 })
  const client = new BinaryAnalysisClient(ida, { timeoutMs: 1000 })
  const findings = new FindingsIndex(client, new MemoryParameterAnalyzer({ llm }))
  return { backend, analyzer: new MemoryFlowAnalyzer({ llm, findings }) }
}

const twoPaths = JSON.stringify({
  paths: [
    {
      hops: [
        { function: { name: 'sub_11170', address: '0x11170' }, parameter: 'a2' },
        { function: { name: 'sub_11460' }, parameter: 'a1' },
      ],
      operation: 'write',
      evidence: 'memset(a1, 0, a2);',
    },
    {
      hops: [
        { function: { name: 'sub_11170', address: '0x11170' }, parameter: 'a1' },
        { function: { name: 'sub_11500', address: '0x11500' }, parameter: 'a1' },
      ],
      operation: 'read',
      evidence: 'IofCompleteRequest(a1, 0);',
    },
  ],
})

describe('MemoryFlowAnalyzer', () => {
  it('keeps only paths whose last hop matches a memory-parameter finding', async () => {
    const { analyzer } = setup(twoPaths)

    const result = await analyzer.trace(handler, handlerCode)

    expect(result.paths).toEqual([
      {
        hops: [
          { function: { address: 0x11170, name: 'sub_11170' }, parameter: 'a2' },
          { function: { address: 0x11460, name: 'sub_11460' }, parameter: 'a1' },
        ],
        operation: 'write',
        evidence: 'memset(a1, 0, a2);',
      },
    ])
    expect(result.rejected).toBe(1)
    expect(result.note).toBeUndefined()
    expect(renderMemoryFlow(result)).toBe(
      [
        '| Parameter | Operation | Path | Evidence |',
        '| --- | --- | --- | --- |',
        '| a2 | write | sub_11170(a2) → sub_11460(a1) | `memset(a1, 0, a2);` |',
        '',
        '_1 unconfirmed candidate path(s) omitted._',
      ].join('\n')
    )
  })

  it('analyzes each terminal function at most once', async () => {
    const { analyzer, backend } = setup(twoPaths)
    await analyzer.trace(handler, handlerCode)
    await analyzer.trace(handler, handlerCode)

    const parameterPrompts = backend.prompts.filter(prompt => prompt.includes('Decide which parameters'))
    expect(parameterPrompts).toHaveLength(2)
  })

  it('notes when every candidate was rejected', async () => {
    const onlyBad = JSON.stringify({
      paths: [
        {
          hops: [{ function: { name: 'sub_11500' }, parameter: 'a1' }],
          operation: 'read',
        },
        {
          hops: [{ function: { name: 'sub_11460' }, parameter: 'a1' }],
          operation: 'zero',
        },
      ],
    })
    const result = await setup(onlyBad).analyzer.trace(handler, handlerCode)

    expect(result.paths).toEqual([])
    expect(result.rejected).toBe(2)
    expect(renderMemoryFlow(result)).toBe(
      'No confirmed path: 2 candidate path(s) did not end at a memory-parameter finding.'
    )
  })

  it('reports an empty answer and an unparsable reply distinctly', async () => {
    const empty = await setup('{"paths": []}').analyzer.trace(handler, handlerCode)
    expect(empty.note).toBe('No parameter reaches a memory operation.')
    expect(empty.outcome.status).toBe('parsed')

    const garbled = await setup('a2 flows into memset').analyzer.trace(handler, handlerCode)
    expect(garbled.outcome).toEqual({ status: 'parse_failed', rawText: 'a2 flows into memset' })
    expect(renderMemoryFlow(garbled)).toBe('Memory flow analysis returned an unparsable reply.')
  })

  it('rejects paths through functions the backend does not know', async () => {
    const unknown = JSON.stringify({
      paths: [{ hops: [{ function: { name: 'sub_99000' }, parameter: 'a1' }], operation: 'copy' }],
    })
    const result = await setup(unknown).analyzer.trace(handler, handlerCode)
    expect(result.rejected).toBe(1)
  })
})
