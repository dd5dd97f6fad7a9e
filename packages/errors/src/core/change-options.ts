import type { Metadata, Milliseconds } from "../ports/error"
import type { Visibility } from "../ports/visibility"
import { addHelpLink, addMetadataValue, type ChangeDraft } from "./draft"

/**
 * An option accepted by `StructuredError#withChanges`.
 *
 * Works on a narrower draft than `ErrorOption`, so construction options are
 * rejected where a change is expected.
 */
export type ChangeOption = (draft: ChangeDraft) => void

/** Replace all metadata. */
export function changeMetadata(metadata: Metadata): ChangeOption {
  return (draft) => {
    draft.metadata = {}

    for (const [key, entry] of Object.entries(metadata)) {
      addMetadataValue(draft, entry.visibility, key, entry.value)
    }
  }
}

export function changeMetadataValue(
  visibility: Visibility,
  key: string,
  value: string,
): ChangeOption {
  return (draft) => {
    addMetadataValue(draft, visibility, key, value)
  }
}

export function changeId(id: string): ChangeOption {
  return (draft) => {
    draft.id = id
  }
}

export function changeTime(time: Date): ChangeOption {
  return (draft) => {
    draft.time = new Date(time.getTime())
  }
}

export function changeSourceId(sourceId: string): ChangeOption {
  return (draft) => {
    draft.sourceId = sourceId
  }
}

/** Append one help link. */
export function changeHelpLink(description: string, url: string): ChangeOption {
  return (draft) => {
    addHelpLink(draft, description, url)
  }
}

export function changeRetryOffset(offset: Milliseconds): ChangeOption {
  return (draft) => {
    draft.retryInfo = { kind: "offset", offset }
  }
}

export function changeRetryTime(time: Date): ChangeOption {
  return (draft) => {
    draft.retryInfo = { kind: "time", time: new Date(time.getTime()) }
  }
}

export function changeLocalizedMessage(locale: string, message: string): ChangeOption {
  return (draft) => {
    draft.localizedMessage = Object.freeze({ locale, message })
  }
}
