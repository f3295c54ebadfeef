/**
 * JSON extraction from LLM replies.
 *
 * Models asked for "JSON only" still wrap it in prose or code fences.
 * Tries, in order: the whole reply, each fenced block, the outermost
 * bracket slice.
 */

const FENCED_BLOCK_RE = /```(?:json)?\s*([\s\S]*?)```/gi

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function sliceBetween(text: string, open: string, close: string): string | null {
  const first = text.indexOf(open)
  const last = text.lastIndexOf(close)
  return first !== -1 && last > first ? text.slice(first, last + 1) : null
}

export function extractJson(raw: string): unknown {
  const text = raw.trim()
  if (!text) return undefined

  const direct = tryParse(text)
  if (direct !== undefined) return direct

  for (const match of text.matchAll(FENCED_BLOCK_RE)) {
    const parsed = tryParse(match[1].trim())
    if (parsed !== undefined) return parsed
  }

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const slice = sliceBetween(text, open, close)
    if (slice) {
      const parsed = tryParse(slice)
      if (parsed !== undefined) return parsed
    }
  }

  return undefined
}
