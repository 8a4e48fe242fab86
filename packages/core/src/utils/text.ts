/**
 * Text Helpers
 *
 * Length limits are counted in code points so a cut never splits a
 * surrogate pair.
 */

const TRUE_TOKENS = new Set(['1', 'true', 'yes', 'on'])
const FALSE_TOKENS = new Set(['0', 'false', 'no', 'off'])

export function codePointLength(text: string): number {
  return Array.from(text).length
}

export function sliceCodePoints(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('')
}

/**
 * Cap `text` at `limit` code points including `suffix`.
 */
export function clipText(text: string, limit: number, suffix = '…'): string {
  if (codePointLength(text) <= limit) {
    return text
  }
  return sliceCodePoints(text, Math.max(0, limit - codePointLength(suffix))) + suffix
}

/**
 * Parse an on/off token. Returns undefined for anything unrecognized.
 */
export function parseSwitch(value: string | undefined): boolean | undefined {
  const token = (value ?? '').trim().toLowerCase()
  if (TRUE_TOKENS.has(token)) return true
  if (FALSE_TOKENS.has(token)) return false
  return undefined
}

/** Loose truthiness for env flags: unset or unknown means false */
export function isTruthy(value: string | undefined): boolean {
  return parseSwitch(value) === true
}
