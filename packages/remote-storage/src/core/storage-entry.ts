import { RemoteStorageConfigError } from "./errors"

export type StorageEntry = {
  /** Storage URL exactly as configured. May carry credentials: log `redactUrl(url)`. */
  url: string
  /** Lowercased URL scheme, e.g. `redis`. */
  scheme: string
  attributes: Readonly<Record<string, string>>
}

const SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]*):/
const REDACTED_PASSWORD = "********"

/**
 * Parse `<url>|<name>=<value>|...`. Attribute values are percent-decoded.
 *
 * @throws {RemoteStorageConfigError} `invalid_entry`
 */
export function parseStorageEntry(entry: string): StorageEntry {
  const [rawUrl = "", ...rawAttributes] = entry.trim().split("|")
  const url = rawUrl.trim()
  const scheme = SCHEME.exec(url)?.[1]

  if (!scheme) {
    throw new RemoteStorageConfigError("invalid_entry", "Storage URL has no scheme", {
      context: { url: redactUrl(url) },
    })
  }

  const attributes: Record<string, string> = {}

  for (const raw of rawAttributes) {
    const eq = raw.indexOf("=")
    const name = eq === -1 ? raw : raw.slice(0, eq)

    if (eq === -1 || name === "") {
      throw new RemoteStorageConfigError(
        "invalid_entry",
        `Missing equal sign in "${name}" attribute`,
        { context: { url: redactUrl(url), attribute: name } },
      )
    }

    attributes[name] = decodeAttributeValue(raw.slice(eq + 1), name, url)
  }

  return { url, scheme: scheme.toLowerCase(), attributes }
}

/** Parse whitespace-separated entries. Blank input yields no entries. */
export function parseStorageEntries(text: string): StorageEntry[] {
  return text
    .split(/\s+/)
    .filter((part) => part !== "")
    .map(parseStorageEntry)
}

/** Render a storage URL for logs, masking any password. */
export function redactUrl(url: string): string {
  if (!URL.canParse(url)) {
    return url.replace(/(\/\/[^:@/]*:)[^@/]*@/, `$1${REDACTED_PASSWORD}@`)
  }

  const parsed = new URL(url)

  if (parsed.password) parsed.password = REDACTED_PASSWORD

  return parsed.href
}

function decodeAttributeValue(value: string, name: string, url: string): string {
  try {
    return decodeURIComponent(value)
  } catch (err) {
    throw new RemoteStorageConfigError(
      "invalid_entry",
      `Invalid percent-encoding in "${name}" attribute`,
      { context: { url: redactUrl(url), attribute: name }, cause: err },
    )
  }
}
