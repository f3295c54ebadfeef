import { describe, expect, it } from 'vitest'
import { LlmClient } from '../services/llm'
import { FakeLlm } from '../test-utils/fakes'
import { IrpAccessAnalyzer, renderIrpAccess } from './irp-access-agent'

const handler = { address: 0x11460, name: 'sub_11460' }
const pseudocode = 'memmove(*(void **)Irp->AssociatedIrp.SystemBuffer, v5, Length);'

function analyzer(reply: string) {
  const backend = new FakeLlm(() => reply)
  return { backend, analyzer: new IrpAccessAnalyzer({ llm: new LlmClient(backend, { timeoutMs: 1000 }) }) }
}

describe('IrpAccessAnalyzer', () => {
  it('parses accesses and trims their fields', async () => {
    const reply = JSON.stringify({
      controllable: true,
      accesses: [
        {
          operation: ' copy ',
          role: 'destination',
          pointerSource: 'Irp->AssociatedIrp.SystemBuffer',
          ioControlCode: '0x222004',
          note: 'memmove(*(void **)SystemBuffer, v5, Length);',
        },
      ],
    })
    const { analyzer: a } = analyzer(reply)

    const outcome = await a.analyze(handler, pseudocode)

    expect(outcome).toEqual({
      status: 'parsed',
      value: {
        controllable: true,
        accesses: [
          {
            operation: 'copy',
            role: 'destination',
            pointerSource: 'Irp->AssociatedIrp.SystemBuffer',
            ioControlCode: '0x222004',
            note: 'memmove(*(void **)SystemBuffer, v5, Length);',
          },
        ],
      },
    })
    expect(renderIrpAccess(outcome)).toBe(
      [
        '- Verdict: IRP-controlled memory access present',
        '',
        '| Operation | Role | Pointer source | IoControlCode | Note |',
        '| --- | --- | --- | --- | --- |',
        '| copy | destination | `Irp->AssociatedIrp.SystemBuffer` | 0x222004 | memmove(*(void **)SystemBuffer, v5, Length); |',
      ].join('\n')
    )
  })

  it('does not call a handler controllable without accesses', async () => {
    const { analyzer: a } = analyzer('{"controllable": true, "accesses": []}')
    const outcome = await a.analyze(handler, pseudocode)
    expect(outcome).toEqual({ status: 'parsed', value: { controllable: false, accesses: [] } })
    expect(renderIrpAccess(outcome)).toBe(
      '- Verdict: no IRP-controlled memory access\n\nNo IRP-controlled memory pointer found.'
    )
  })

  it('passes the callee context into the prompt', async () => {
    const { analyzer: a, backend } = analyzer('{"controllable": false, "accesses": []}')
    await a.analyze(handler, pseudocode, '#### sub_11500 (0x11500) · internal\n\nZeroes a buffer.')
    expect(backend.prompts[0]).toContain('Zeroes a buffer.')
    expect(backend.prompts[0]).toContain('AssociatedIrp')
  })

  it('degrades an unparsable reply to a visible note', async () => {
    const { analyzer: a } = analyzer('Yes, SystemBuffer is used.')
    const outcome = await a.analyze(handler, pseudocode)
    expect(outcome.status).toBe('parse_failed')
    expect(renderIrpAccess(outcome)).toBe('_IRP access analysis returned an unparsable reply; no findings recorded._')
  })
})
