import type { Milliseconds, RetryInfo } from "../ports/error"
import { codeName, visibilityName } from "./code-info"
import { stackEntries } from "./stack-trace"
import { StructuredError } from "./structured-error"
import { errorText } from "./utils/error-text"

const NANOS_PER_MILLI = 1_000_000n
const NANOS_PER_SECOND = 1_000_000_000n

function fractionDigits(remainder: bigint, precision: number): string {
  const digits = remainder.toString().padStart(precision, "0").replace(/0+$/, "")
  return digits === "" ? "" : `.${digits}`
}

function withFraction(nanos: bigint, precision: number): string {
  const unit = 10n ** BigInt(precision)
  return `${nanos / unit}${fractionDigits(nanos % unit, precision)}`
}

/** Whole milliseconds and the sub-millisecond rest are converted apart. */
function toNanos(duration: Milliseconds): bigint {
  const whole = Math.trunc(duration)
  return BigInt(whole) * NANOS_PER_MILLI + BigInt(Math.round((duration - whole) * 1e6))
}

/**
 * Render a duration the way durations read in logs: `0s`, `500ms`, `1.5s`,
 * `1m0s`, `1h2m3s`. Sub-millisecond precision renders in `µs` and `ns`.
 */
export function formatDuration(duration: Milliseconds): string {
  if (!Number.isFinite(duration)) return String(duration)

  const sign = duration < 0 ? "-" : ""
  const nanos = toNanos(Math.abs(duration))

  if (nanos === 0n) return "0s"

  if (nanos < NANOS_PER_SECOND) {
    if (nanos < 1_000n) return `${sign}${nanos}ns`
    if (nanos < NANOS_PER_MILLI) return `${sign}${withFraction(nanos, 3)}µs`
    return `${sign}${withFraction(nanos, 6)}ms`
  }

  const totalSeconds = nanos / NANOS_PER_SECOND
  const seconds = `${totalSeconds % 60n}${fractionDigits(nanos % NANOS_PER_SECOND, 9)}s`
  const totalMinutes = totalSeconds / 60n

  if (totalMinutes === 0n) return `${sign}${seconds}`

  const hours = totalMinutes / 60n
  const minutes = `${totalMinutes % 60n}m`

  return `${sign}${hours > 0n ? `${hours}h` : ""}${minutes}${seconds}`
}

/** RFC 3339 in UTC with whole seconds, e.g. `2024-01-15T14:30:45Z`. */
export function formatRfc3339(time: Date): string {
  if (Number.isNaN(time.getTime())) return "Invalid Date"
  return time.toISOString().replace(/\.\d{3}Z$/, "Z")
}

function formatRetryInfo(retryInfo: RetryInfo): string {
  return retryInfo.kind === "offset"
    ? `retryOffset=${formatDuration(retryInfo.offset)}`
    : `retryTime=${formatRfc3339(retryInfo.time)}`
}

/** Orders keys by code point, which is also their UTF-8 byte order. */
function compareKeys(a: string, b: string): number {
  let i = 0

  while (i < a.length && i < b.length) {
    const x = a.codePointAt(i) ?? 0
    const y = b.codePointAt(i) ?? 0
    if (x !== y) return x - y
    i += x > 0xffff ? 2 : 1
  }

  return a.length - b.length
}

function head(err: StructuredError): string {
  const lines = [
    errorText(err).trim(),
    `  visibility: ${visibilityName(err.visibility)}`,
    `  domain: ${err.domain}`,
    `  reason: ${err.reason}`,
    `  code: ${codeName(err.code)}`,
  ]

  if (err.id !== "") lines.push(`  id: ${err.id}`)

  const time = err.time
  if (time) lines.push(`  time: ${formatRfc3339(time)}`)

  if (err.subject !== "") lines.push(`  subject: ${err.subject}`)
  if (err.sourceId !== "") lines.push(`  sourceId: ${err.sourceId}`)

  const retryInfo = err.retryInfo
  if (retryInfo) lines.push(`  retryInfo: ${formatRetryInfo(retryInfo)}`)

  const keys = Object.keys(err.metadata).sort(compareKeys)
  if (keys.length > 0) {
    lines.push("  metadata:")

    for (const key of keys) {
      const entry = err.metadata[key]
      if (!entry) continue
      lines.push(`    - ${key}: ${entry.value} visibility=${visibilityName(entry.visibility)}`)
    }
  }

  let text = lines.join("\n")

  const links = err.help?.links ?? []
  if (links.length > 0) {
    text += `\n\n${links.map((link) => `- ${link.description}: ${link.url}`).join("\n")}`
  }

  return text
}

function debugTail(err: StructuredError): string {
  const debugInfo = err.debugInfo
  if (!debugInfo) return ""

  let text = "\n"
  if (debugInfo.detail !== "") text += `\n${debugInfo.detail}`

  for (const entry of stackEntries(debugInfo)) {
    text += `\n${entry}`
  }

  return text
}

/**
 * Deterministic multi-line rendering of a StructuredError and everything it
 * wraps.
 *
 * @remarks
 * Walks the wrapped chain iteratively. Each error's debug block closes its
 * own text, so debug blocks of outer errors come after those of inner ones.
 */
export function formatError(err: StructuredError): string {
  let text = ""
  const tails: string[] = []
  let current: unknown = err

  for (;;) {
    if (!(current instanceof StructuredError)) {
      text += errorText(current)
      break
    }

    text += head(current)
    tails.push(debugTail(current))

    const wrapped = current.cause
    if (wrapped === undefined) break

    text += "\n\nwrapped error: "
    current = wrapped
  }

  return text + tails.reverse().join("")
}
