import { writeFileSync } from 'fs'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { CacheStore } from '../services/cache-store'
import { LlmClient } from '../services/llm'
import { FakeLlm, FakeStructuredLlm, tempDir } from '../test-utils/fakes'
import { Summarizer, extractSentinels } from './summarizer'

describe('extractSentinels', () => {
  it('strips markers and records annotations', () => {
    const result = extractSentinels('# sub_1\n\nCopies the buffer.\n\n# MEM #\n\n> Address: 0x1')
    expect(result.markdown).toBe('# sub_1\n\nCopies the buffer.\n\n> Address: 0x1')
    expect([...result.annotations]).toEqual(['MEM'])
  })

  it('accepts loose spacing and case', () => {
    const result = extractSentinels('Maps a section. #map#\n#  MEM  #')
    expect(result.markdown).toBe('Maps a section.')
    expect([...result.annotations].sort()).toEqual(['MAP', 'MEM'])
  })

  it('leaves prose mentioning memory alone', () => {
    const result = extractSentinels('Performs MEM copy and MAP operations.')
    expect(result.markdown).toBe('Performs MEM copy and MAP operations.')
    expect(result.annotations.size).toBe(0)
  })
})

describe('Summarizer', () => {
  let cache: CacheStore

  beforeEach(async () => {
    cache = new CacheStore({ path: join(tempDir(), 'cache.jsonl') })
    await cache.open()
  })

  afterEach(async () => {
    await cache.close()
  })

  it('describes a new external symbol once and caches it', async () => {
    const backend = new FakeLlm(() => '# ZwClose\n\nCloses a handle.')
    const summarizer = new Summarizer({ llm: new LlmClient(backend, { timeoutMs: 1000 }), cache })

    const first = await summarizer.describeExternal('ZwClose', 0x12010)
    const second = await summarizer.describeExternal('ZwClose', 0x12010)

    expect(first).toBe('# ZwClose\n\nCloses a handle.\n\n> IAT Address: 0x12010')
    expect(second).toBe(first)
    expect(backend.prompts).toHaveLength(1)
  })

  it('serves a cache hit without the LLM and records the new address', async () => {
    await cache.close()
    const path = cache.path
    writeFileSync(
      path,
      JSON.stringify({ key: 'IofCompleteRequest', markdown: 'Completes an IRP.', iat_addresses: ['0x12058'] }) + '\n'
    )
    cache = new CacheStore({ path })
    await cache.open()
    const backend = new FakeLlm(() => 'should not be used')
    const summarizer = new Summarizer({ llm: new LlmClient(backend, { timeoutMs: 1000 }), cache })

    const markdown = await summarizer.describeExternal('IofCompleteRequest', 0x13000)

    expect(markdown).toBe('Completes an IRP.')
    expect(backend.prompts).toEqual([])
    expect([...(cache.lookup('IofCompleteRequest')?.iatAddresses ?? [])]).toEqual([0x12058, 0x13000])
  })

  it('issues one LLM call for concurrent misses on the same symbol', async () => {
    const backend = new FakeLlm(
      () => new Promise<string>(resolve => setTimeout(resolve, 10, '# MmMapIoSpace\n\nMaps physical memory.'))
    )
    const summarizer = new Summarizer({ llm: new LlmClient(backend, { timeoutMs: 1000 }), cache })

    await Promise.all([
      summarizer.describeExternal('MmMapIoSpace', 0x1),
      summarizer.describeExternal('MmMapIoSpace', 0x2),
    ])

    expect(backend.prompts).toHaveLength(1)
    expect([...(cache.lookup('MmMapIoSpace')?.iatAddresses ?? [])]).toEqual([0x1, 0x2])
  })

  it('describes internal routines from the text fallback with sentinels', async () => {
    const backend = new FakeLlm(() => '# sub_11460\n\nCopies user input.\n\n# MEM #\n\n> Address: 0x11460')
    const summarizer = new Summarizer({ llm: new LlmClient(backend, { timeoutMs: 1000 }), cache })

    const described = await summarizer.describeInternal({ address: 0x11460, name: 'sub_11460' }, 'memcpy(a, b, n);')

    expect(described.markdown).toBe('# sub_11460\n\nCopies user input.\n\n> Address: 0x11460')
    expect([...described.annotations]).toEqual(['MEM'])
    expect(backend.prompts[0]).toContain('memcpy(a, b, n);')
  })

  it('renders structured descriptions', async () => {
    const backend = new FakeStructuredLlm(
      () => 'unused',
      () => ({
        definition: 'void sub_1(void *dst);',
        description: 'Maps device registers.',
        performsMemoryCopy: false,
        performsMemoryMapping: true,
      })
    )
    const summarizer = new Summarizer({ llm: new LlmClient(backend, { timeoutMs: 1000 }), cache })

    const described = await summarizer.describeInternal({ address: 0x1, name: 'sub_1' }, 'MmMapIoSpace(x, y, 0);')

    expect(described.markdown).toBe(
      '# sub_1\n\n## Definition\n\n```c\nvoid sub_1(void *dst);\n```\n\n## Description\n\nMaps device registers.\n\n> Address: 0x1'
    )
    expect([...described.annotations]).toEqual(['MAP'])
    expect(backend.prompts).toEqual([])
  })
})
