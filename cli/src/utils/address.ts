/**
 * Hex address helpers for the wire and JSON boundaries.
 */

const HEX_RE = /^(?:0x)?([0-9a-f]+)h?$/i
const PLACEHOLDER_NAME_RE = /^(?:sub|loc|nullsub|j_sub)_([0-9a-f]+)$/i

export function formatAddress(address: number): string {
  return `0x${address.toString(16)}`
}

/**
 * Parse "0x11209", "11209h" or a bare hex string. Numbers pass through.
 * Returns null for anything else.
 */
export function tryParseAddress(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : null
  }
  if (typeof value !== 'string') return null

  const match = HEX_RE.exec(value.trim())
  if (!match) return null
  const parsed = Number.parseInt(match[1], 16)
  return Number.isSafeInteger(parsed) ? parsed : null
}

export function parseAddress(value: unknown): number {
  const parsed = tryParseAddress(value)
  if (parsed === null) {
    throw new TypeError(`Not a hex address: ${JSON.stringify(value)}`)
  }
  return parsed
}

/** Backend placeholder names encode their own address (sub_11460 -> 0x11460) */
export function addressFromPlaceholderName(name: string): number | null {
  const match = PLACEHOLDER_NAME_RE.exec(name)
  return match ? Number.parseInt(match[1], 16) : null
}
