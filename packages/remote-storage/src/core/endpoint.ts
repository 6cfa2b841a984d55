export const DEFAULT_REDIS_PORT = 6379

export type RedisEndpoint =
  | { kind: "tcp"; host: string; port: number }
  | { kind: "unix"; path: string }

export type ResolvedEndpoint = RedisEndpoint | { kind: "invalid"; reason: string }

/**
 * Derive where to connect from a storage URL.
 *
 * `redis://host[:port]` is TCP, `redis:///path/to.sock` a unix socket.
 * Never throws; an unusable URL resolves to `invalid`.
 */
export function resolveEndpoint(url: string): ResolvedEndpoint {
  if (!URL.canParse(url)) return { kind: "invalid", reason: "malformed url" }

  const parsed = new URL(url)
  const host = stripBrackets(parsed.hostname)

  if (host) {
    if (parsed.port === "") return { kind: "tcp", host, port: DEFAULT_REDIS_PORT }

    const port = Number(parsed.port)

    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
      return { kind: "invalid", reason: `port out of range: ${parsed.port}` }
    }

    return { kind: "tcp", host, port }
  }

  const path = decodePath(parsed.pathname)

  if (path === undefined) return { kind: "invalid", reason: "malformed socket path" }
  if (path && path !== "/") return { kind: "unix", path }

  return { kind: "invalid", reason: "url has neither host nor path" }
}

export function describeEndpoint(endpoint: RedisEndpoint): string {
  return endpoint.kind === "tcp" ? `${endpoint.host}:${endpoint.port}` : endpoint.path
}

function stripBrackets(host: string): string {
  return host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host
}

function decodePath(pathname: string): string | undefined {
  try {
    return decodeURIComponent(pathname)
  } catch (err) {
    if (err instanceof URIError) return undefined
    throw err
  }
}
