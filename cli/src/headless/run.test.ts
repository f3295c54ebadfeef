import { existsSync } from 'fs'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { BinaryAnalysisClient } from '../services/binary-analysis'
import { CacheStore } from '../services/cache-store'
import { LlmClient } from '../services/llm'
import { FakeLlm, fakeIda, tempDir, type LlmResponder } from '../test-utils/fakes'
import { silentLogger } from '../utils/logger'
import { loadConfig } from '../utils/user-config'
import { runHeadless, type CommandContext } from './run'

const ida = fakeIda({
  imports: [
    { address: 0x2000, name: 'IoCreateDevice' },
    { address: 0x12058, name: 'IofCompleteRequest' },
  ],
  xrefs: { 0x2000: [0x11209] },
  functions: [
    { address: 0x11170, name: 'sub_11170', size: 0x100, pseudocode: 'a1->MajorFunction[14] = sub_11460;' },
    {
      address: 0x11460,
      name: 'sub_11460',
      size: 0x40,
      pseudocode: 'IofCompleteRequest(a2, 0);',
      callees: [{ address: 0x12058, name: 'IofCompleteRequest' }],
    },
  ],
})

describe('runHeadless', () => {
  let cache: CacheStore
  let reportDir: string

  beforeEach(async () => {
    const home = tempDir()
    reportDir = join(home, 'reports')
    cache = new CacheStore({ path: join(home, 'cache.jsonl') })
    await cache.open()
  })

  afterEach(async () => {
    await cache.close()
  })

  function context(responder: LlmResponder = () => ''): CommandContext {
    const config = loadConfig({ env: { DRVTRIAGE_HOME: tempDir() }, overrides: { reportDir, apiKey: 'test-secret' } })
    return {
      config,
      client: new BinaryAnalysisClient(ida, { timeoutMs: 1000 }),
      llm: new LlmClient(new FakeLlm(responder), { timeoutMs: 1000 }),
      cache,
      logger: silentLogger,
      runId: 'test-run',
    }
  }

  it('discover-entries returns serialized callers', async () => {
    const result = await runHeadless({ command: 'discover-entries' }, context())
    expect(result).toMatchObject({
      success: true,
      command: 'discover-entries',
      runId: 'test-run',
      summary: '1 routine(s) reference IoCreateDevice: sub_11170',
      data: [{ address: '0x11209', func_name: 'sub_11170' }],
    })
  })

  it('resolve-dispatch-target returns the handler', async () => {
    const result = await runHeadless(
      { command: 'resolve-dispatch-target', target: { address: 0x11170, name: 'sub_11170' } },
      context()
    )
    expect(result.data).toEqual({ address: '0x11460', func_name: 'sub_11460' })
    expect(result.summary).toBe('sub_11170 -> sub_11460 (pattern)')
  })

  it('list-subfunctions classifies callees', async () => {
    const result = await runHeadless(
      { command: 'list-subfunctions', target: { address: 0x11460, name: 'sub_11460' } },
      context()
    )
    expect(result.data).toEqual([{ address: '0x12058', name: 'IofCompleteRequest', type: 'external' }])
  })

  it('analyze-memory-parameters keeps the raw reply when it does not parse', async () => {
    const result = await runHeadless(
      { command: 'analyze-memory-parameters', target: { address: 0x11460, name: 'sub_11460' } },
      context(() => 'no idea')
    )
    expect(result.success).toBe(true)
    expect(result.data).toEqual({
      function: { name: 'sub_11460', address: '0x11460' },
      status: 'parse_failed',
      has_memory_address_param: false,
      memory_parameters: [],
      markdown: '_Memory parameter analysis returned an unparsable reply; no findings recorded._',
      rawText: 'no idea',
    })
  })

  it('reports failures with their kind', async () => {
    const result = await runHeadless(
      { command: 'describe-internal', target: { address: 0x90000, name: 'sub_90000' } },
      context()
    )
    expect(result).toMatchObject({
      success: false,
      summary: 'describe-internal failed',
      errorKind: 'DecompilationFailed',
      error: 'Cannot decompile sub_90000 (0x90000): Decompilation failed at 0x90000',
    })
  })

  it('run-full-pipeline writes the report', async () => {
    const responder: LlmResponder = prompt => {
      if (prompt.startsWith('Describe the kernel API')) return '# IofCompleteRequest\n\nCompletes an IRP.'
      if (prompt.includes('Decide which parameters')) return '{"memory_parameters": []}'
      if (prompt.includes('trace how its parameters')) return '{"paths": []}'
      return '{"controllable": false, "accesses": []}'
    }

    const result = await runHeadless({ command: 'run-full-pipeline' }, context(responder))

    expect(result.success).toBe(true)
    expect(result.data).toMatchObject({
      targets: [{ address: '0x11460', func_name: 'sub_11460' }],
      unresolved: [],
    })
    expect(result.summary.startsWith(`Report written to ${reportDir}`)).toBe(true)
    expect(existsSync(reportDir)).toBe(true)
  })

  it('compact-cache returns the record counts', async () => {
    await cache.upsert('ZwClose', 'Closes a handle.', 0x1)
    await cache.upsert('ZwClose', 'Closes a handle.', 0x2)

    const result = await runHeadless({ command: 'compact-cache' }, context())

    expect(result.data).toEqual({ before: 2, after: 1 })
    expect(result.summary).toBe('Cache compacted: 2 -> 1 records')
  })
})
