/**
 * Disclosure tiers, ordered by increasing audience.
 *
 * - `Internal`: only within the owning service/process.
 * - `Private`: across internal services, never to end users.
 * - `Public`: safe to show to external callers.
 */
export const Visibility = {
  Internal: 0,
  Private: 1,
  Public: 2,
} as const

export type Visibility = (typeof Visibility)[keyof typeof Visibility]

export type VisibilityName = "INTERNAL" | "PRIVATE" | "PUBLIC"
