/** Text of an arbitrary thrown value. Never throws. */
export function errorText(err: unknown): string {
  try {
    if (err instanceof Error) return String(err.message)
    return String(err)
  } catch {
    return Object.prototype.toString.call(err)
  }
}
