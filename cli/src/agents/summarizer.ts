/**
 * Summarizer - function descriptions
 *
 * External (imported) symbols are described from public API knowledge and
 * cached; internal routines are described from their pseudocode every time.
 */

import { z } from 'zod'
import type { CacheStore } from '../services/cache-store'
import type { ChatMessage } from '../services/llm'
import type { DescriptionAnnotation, FunctionDescription, FunctionRef } from '../types/analysis'
import { formatAddress } from '../utils/address'
import { KeyedMutex } from '../utils/concurrency'
import { silentLogger, type Logger } from '../utils/logger'
import { DRIVER_ANALYST_PROMPT, type AgentDeps } from './types'

const EXTERNAL_SYSTEM_PROMPT = 'You are a technical writer who knows the Windows kernel API well.'

const SENTINEL_RE = /#\s*(MEM|MAP)\s*#/gi

const internalDescriptionSchema = z.object({
  definition: z.string().describe('Most plausible C prototype'),
  description: z.string().describe('One or two paragraphs on what the routine does'),
  performsMemoryCopy: z.boolean().describe('Copies or moves raw memory (memcpy, memmove, RtlCopyMemory...)'),
  performsMemoryMapping: z.boolean().describe('Maps memory (MmMapIoSpace, MmMapLockedPages, ZwMapViewOfSection...)'),
})

type InternalDescription = z.infer<typeof internalDescriptionSchema>

function externalMessages(name: string, address: number): ChatMessage[] {
  return [
    { role: 'system', content: EXTERNAL_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Describe the kernel API \`${name}\` from public Windows driver documentation.
Output format:
1. A level-one heading with the function name.
2. A "Definition" section with the C prototype in a \`\`\`c block.
3. A "Description" section: 1-2 paragraphs on its purpose, key parameters and typical use.
4. End with the line: \`> IAT Address: ${formatAddress(address)}\`
Return only the Markdown, no commentary.`,
    },
  ]
}

function internalMessages(fn: FunctionRef, pseudocode: string, withSentinels: boolean): ChatMessage[] {
  const format = withSentinels
    ? `Output Markdown:
- A level-one heading with the function name.
- A "Definition" section with the most plausible C signature in a \`\`\`c block.
- A "Description" section: 1-2 paragraphs on the overall logic, notable calls and side effects.
- If the routine copies or moves raw memory (memcpy, memmove, RtlCopyMemory...), append a line \`# MEM #\`.
- If the routine maps memory (MmMapIoSpace, MmMapLockedPages, ZwMapViewOfSection...), append a line \`# MAP #\`.
- End with \`> Address: ${formatAddress(fn.address)}\`.
Return only the Markdown, no commentary.`
    : 'Return the definition, a short description and whether the routine copies/moves raw memory or maps memory.'

  return [
    { role: 'system', content: DRIVER_ANALYST_PROMPT },
    {
      role: 'user',
      content: `Analyze the internal function ${fn.name} at ${formatAddress(fn.address)}.

\`\`\`c
${pseudocode}
\`\`\`

${format}`,
    },
  ]
}

/**
 * Pull `# MEM #` / `# MAP #` markers out of a reply. Anything that is not an
 * exact marker is left as prose.
 */
export function extractSentinels(markdown: string): FunctionDescription {
  const annotations = new Set<DescriptionAnnotation>()
  const stripped = markdown.replace(SENTINEL_RE, (_, tag: string) => {
    annotations.add(tag.toUpperCase() === 'MAP' ? 'MAP' : 'MEM')
    return ''
  })

  const cleaned = stripped
    .split('\n')
    .map(line => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()

  return { markdown: cleaned, annotations }
}

function renderInternal(fn: FunctionRef, described: InternalDescription): FunctionDescription {
  const annotations = new Set<DescriptionAnnotation>()
  if (described.performsMemoryCopy) annotations.add('MEM')
  if (described.performsMemoryMapping) annotations.add('MAP')

  const markdown = [
    `# ${fn.name}`,
    '',
    '## Definition',
    '',
    '```c',
    described.definition.trim(),
    '```',
    '',
    '## Description',
    '',
    described.description.trim(),
    '',
    `> Address: ${formatAddress(fn.address)}`,
  ].join('\n')

  return { markdown, annotations }
}

function withIatLine(markdown: string, address: number): string {
  const line = `> IAT Address: ${formatAddress(address)}`
  return markdown.includes('> IAT Address:') ? markdown : `${markdown.trimEnd()}\n\n${line}`
}

export interface SummarizerDeps extends AgentDeps {
  cache: CacheStore
}

export class Summarizer {
  private readonly logger: Logger
  private readonly externalLocks = new KeyedMutex()

  constructor(private readonly deps: SummarizerDeps) {
    this.logger = deps.logger ?? silentLogger
  }

  /**
   * Cached description of an imported symbol. A hit records `address`
   * against the entry and never calls the LLM.
   */
  async describeExternal(name: string, address: number): Promise<string> {
    const { cache, llm } = this.deps

    return this.externalLocks.run(name.toLowerCase(), async () => {
      const cached = cache.lookup(name)
      if (cached) {
        this.logger.debug({ name, address: formatAddress(address) }, 'external description cache hit')
        const entry = await cache.upsert(name, cached.markdown, address)
        return entry.markdown
      }

      const reply = await llm.text(externalMessages(name, address), `describe ${name}`)
      const entry = await cache.upsert(name, withIatLine(reply.trim(), address), address)
      return entry.markdown
    })
  }

  /**
   * Description of an internal routine with MEM/MAP annotations
   */
  async describeInternal(fn: FunctionRef, pseudocode: string): Promise<FunctionDescription> {
    const { llm } = this.deps
    const purpose = `describe ${fn.name}`

    const structured = await llm.structured(internalMessages(fn, pseudocode, false), internalDescriptionSchema, purpose)
    if (structured) {
      return renderInternal(fn, structured)
    }

    const reply = await llm.text(internalMessages(fn, pseudocode, true), purpose)
    return extractSentinels(reply)
  }
}
