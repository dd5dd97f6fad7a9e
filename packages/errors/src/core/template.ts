import type { Code } from "../ports/code"
import type { Help, HelpLink } from "../ports/error"
import type { Visibility } from "../ports/visibility"
import {
  type ErrorOption,
  withCode,
  withHelpLink,
  withMessage,
  withVisibility,
} from "./options"
import { StructuredError } from "./structured-error"
import { buildError } from "./utils/create-error"

export type TemplateDefaults = {
  code: Code | undefined
  message: string
  visibility: Visibility | undefined
  helpLinks: HelpLink[]
}

export type TemplateOption = (defaults: TemplateDefaults) => void

export function templateWithCode(code: Code): TemplateOption {
  return (defaults) => {
    defaults.code = code
  }
}

export function templateWithMessage(message: string): TemplateOption {
  return (defaults) => {
    defaults.message = message
  }
}

export function templateWithVisibility(visibility: Visibility): TemplateOption {
  return (defaults) => {
    defaults.visibility = visibility
  }
}

/** Replace the template's help links. */
export function templateWithHelp(help: Help): TemplateOption {
  return (defaults) => {
    defaults.helpLinks = help.links.map((link) => Object.freeze({ ...link }))
  }
}

export function templateWithHelpLink(description: string, url: string): TemplateOption {
  return (defaults) => {
    defaults.helpLinks.push(Object.freeze({ description, url }))
  }
}

/**
 * A reusable definition of one error family: identity plus defaults.
 *
 * Not an error itself. Use `newError` to stamp out instances and `is` to
 * recognise them.
 */
export class ErrorTemplate {
  readonly domain: string
  readonly reason: string
  private readonly baseline: readonly ErrorOption[]

  constructor(domain: string, reason: string, defaults: TemplateDefaults) {
    this.domain = domain
    this.reason = reason

    const baseline: ErrorOption[] = []
    if (defaults.code !== undefined) baseline.push(withCode(defaults.code))
    if (defaults.visibility !== undefined) baseline.push(withVisibility(defaults.visibility))
    if (defaults.message !== "") baseline.push(withMessage(defaults.message))
    for (const link of defaults.helpLinks) {
      baseline.push(withHelpLink(link.description, link.url))
    }

    this.baseline = Object.freeze(baseline)
  }

  /**
   * A new error with the template's identity and defaults. `options` run
   * after the defaults, so they override scalar fields and append help links.
   */
  newError(...options: ErrorOption[]): StructuredError {
    return buildError(this.domain, this.reason, this.newError, [...this.baseline, ...options])
  }

  /** Whether `err` itself belongs to this family. Does not walk `cause`. */
  is(err: unknown): boolean {
    return err instanceof StructuredError && err.domain === this.domain && err.reason === this.reason
  }
}

/**
 * @example
 * ```ts
 * const UserNotFound = createErrorTemplate("accounts.users", "USER_NOT_FOUND",
 *   templateWithCode(Code.NotFound),
 *   templateWithVisibility(Visibility.Public),
 * )
 *
 * throw UserNotFound.newError(withMetadataValue(Visibility.Public, "userId", id))
 * ```
 */
export function createErrorTemplate(
  domain: string,
  reason: string,
  ...options: TemplateOption[]
): ErrorTemplate {
  const defaults: TemplateDefaults = {
    code: undefined,
    message: "",
    visibility: undefined,
    helpLinks: [],
  }

  for (const option of options) {
    option(defaults)
  }

  return new ErrorTemplate(domain, reason, defaults)
}
