import { describe, expect, it } from 'vitest'
import { BinaryAnalysisClient } from '../services/binary-analysis'
import { LlmClient } from '../services/llm'
import { FakeLlm, fakeIda } from '../test-utils/fakes'
import { DispatchResolver, matchDispatchAssignment } from './dispatch-resolver'

describe('matchDispatchAssignment', () => {
  it('matches indexed assignments with casts and address-of', () => {
    expect(matchDispatchAssignment('DriverObject->MajorFunction[14] = (PDRIVER_DISPATCH)sub_11460;')).toBe('sub_11460')
    expect(matchDispatchAssignment('a1->MajorFunction[0xE] = &DispatchIoctl;')).toBe('DispatchIoctl')
    expect(matchDispatchAssignment('a1->MajorFunction[IRP_MJ_DEVICE_CONTROL] = DeviceControl;')).toBe('DeviceControl')
  })

  it('matches raw offset stores by pointer width', () => {
    expect(matchDispatchAssignment('*(_QWORD *)(a1 + 224) = sub_140001830;')).toBe('sub_140001830')
    expect(matchDispatchAssignment('*(_QWORD *)(DriverObject + 0xE0) = sub_140001830;')).toBe('sub_140001830')
    expect(matchDispatchAssignment('*(_DWORD *)(a1 + 112) = sub_10830;')).toBe('sub_10830')
  })

  it('does not read an x64 MajorFunction[0] store as slot 14', () => {
    expect(matchDispatchAssignment('*(_QWORD *)(a1 + 0x70) = sub_140001000;')).toBeNull()
  })

  it('ignores other slots and takes the last assignment', () => {
    const code = [
      'a1->MajorFunction[0] = sub_11000;',
      'a1->MajorFunction[14] = sub_11100;',
      'a1->MajorFunction[2] = sub_11200;',
      'a1->MajorFunction[14] = sub_11300;',
    ].join('\n')
    expect(matchDispatchAssignment(code)).toBe('sub_11300')
    expect(matchDispatchAssignment(code, 2)).toBe('sub_11200')
    expect(matchDispatchAssignment('return STATUS_SUCCESS;')).toBeNull()
  })
})

describe('DispatchResolver', () => {
  const caller = { address: 0x11170, name: 'sub_11170' }
  const ida = fakeIda({
    imports: [],
    functions: [{ address: 0x11800, name: 'DispatchIoctl', size: 0x80 }],
  })

  function resolver(reply = '{"address": null, "func_name": null}') {
    const backend = new FakeLlm(() => reply)
    const resolver = new DispatchResolver({
      llm: new LlmClient(backend, { timeoutMs: 1000 }),
      client: new BinaryAnalysisClient(ida, { timeoutMs: 1000 }),
    })
    return { resolver, backend }
  }

  it('resolves placeholder names from the pattern without the LLM', async () => {
    const { resolver: r, backend } = resolver()
    const resolution = await r.resolve(caller, 'DriverObject->MajorFunction[14] = sub_11460;')
    expect(resolution).toEqual({ caller, target: { address: 0x11460, name: 'sub_11460' }, method: 'pattern' })
    expect(backend.prompts).toEqual([])
  })

  it('looks named handlers up in the database', async () => {
    const resolution = await resolver().resolver.resolve(caller, 'a1->MajorFunction[14] = DispatchIoctl;')
    expect(resolution.target).toEqual({ address: 0x11800, name: 'DispatchIoctl' })
  })

  it('fails when a named handler is unknown', async () => {
    await expect(resolver().resolver.resolve(caller, 'a1->MajorFunction[14] = Missing;')).rejects.toMatchObject({
      kind: 'DispatchNotResolved',
      message: 'sub_11170: handler Missing not found in the database',
    })
  })

  it('asks the LLM when no assignment is recognized', async () => {
    const { resolver: r, backend } = resolver('```json\n{"address": "0x114a0", "func_name": null}\n```')
    const resolution = await r.resolve(caller, 'v2 = a1; sub_11000(v2);')
    expect(resolution).toEqual({ caller, target: { address: 0x114a0, name: 'sub_114A0' }, method: 'llm' })
    expect(backend.prompts).toHaveLength(1)
  })

  it('reports a missing assignment and an unparsable reply as DispatchNotResolved', async () => {
    await expect(resolver().resolver.resolve(caller, 'return 0;')).rejects.toThrow(
      'sub_11170 assigns no MajorFunction[14] handler'
    )
    await expect(resolver('I am not sure.').resolver.resolve(caller, 'return 0;')).rejects.toThrow(
      'sub_11170: unparsable dispatch reply'
    )
  })
})
