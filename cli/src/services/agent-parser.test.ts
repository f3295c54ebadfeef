import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { FakeLlm, FakeStructuredLlm } from '../test-utils/fakes'
import { buildItemSummary, parseReply, requestStructured, tableCell } from './agent-parser'
import { LlmClient } from './llm'

const schema = z.object({ ok: z.boolean() })

describe('parseReply', () => {
  it('parses fenced JSON that matches the schema', () => {
    expect(parseReply('```json\n{"ok": true}\n```', schema)).toEqual({ status: 'parsed', value: { ok: true } })
  })

  it('keeps the raw text when parsing or validation fails', () => {
    expect(parseReply('I cannot tell.', schema)).toEqual({ status: 'parse_failed', rawText: 'I cannot tell.' })
    expect(parseReply('{"ok": "yes"}', schema)).toEqual({ status: 'parse_failed', rawText: '{"ok": "yes"}' })
  })
})

describe('requestStructured', () => {
  const messages = [{ role: 'user' as const, content: 'structured prompt' }]
  const fallbackMessages = [{ role: 'user' as const, content: 'text prompt' }]

  it('uses structured output when available', async () => {
    const backend = new FakeStructuredLlm(() => '{"ok": false}', () => ({ ok: true }))
    const llm = new LlmClient(backend, { timeoutMs: 1000 })

    const outcome = await requestStructured({ llm, purpose: 'p', messages, fallbackMessages, structuredSchema: schema })

    expect(outcome).toEqual({ status: 'parsed', value: { ok: true } })
    expect(backend.prompts).toEqual([])
  })

  it('falls back to the text prompt and the loose schema', async () => {
    const backend = new FakeLlm(() => 'Answer: {"ok": 1}')
    const llm = new LlmClient(backend, { timeoutMs: 1000 })
    const loose = z.object({ ok: z.union([z.boolean(), z.number()]) }).transform(value => ({ ok: Boolean(value.ok) }))

    const outcome = await requestStructured({
      llm,
      purpose: 'p',
      messages,
      fallbackMessages,
      structuredSchema: schema,
      fallbackSchema: loose,
    })

    expect(outcome).toEqual({ status: 'parsed', value: { ok: true } })
    expect(backend.prompts).toEqual(['text prompt'])
  })
})

describe('buildItemSummary', () => {
  it('counts and truncates', () => {
    expect(buildItemSummary([], String, 'callers')).toBe('0 callers')
    expect(buildItemSummary(['a', 'b'], String, 'callers')).toBe('2 callers: a, b')
    expect(buildItemSummary(['a', 'b', 'c'], String, 'callers', 2)).toBe('3 callers: a, b +1 more')
  })
})

describe('tableCell', () => {
  it('escapes pipes and flattens newlines', () => {
    expect(tableCell('a | b\nc')).toBe('a \\| b c')
  })
})
