/**
 * Hostname allow-list matching:
 * - `example.com` matches only that host
 * - `*.example.com` matches subdomains at any depth, not `example.com` itself,
 *   and never a host carrying an IPv6 zone id (`%`)
 * - `*` matches every host
 */
export function hostnameAllowed(hostname: string, patterns: readonly string[]): boolean {
  const host = hostname.toLowerCase()
  for (const raw of patterns) {
    const pattern = raw.toLowerCase()
    if (pattern === '*') return true
    if (pattern.startsWith('*.')) {
      if (host.includes('%')) return false
      if (host.endsWith(pattern.slice(1))) return true
    }
    else if (host === pattern) {
      return true
    }
  }
  return false
}

export function parseAllowedHostnames(value: string | undefined): string[] {
  if (!value) return []
  return Array.from(
    new Set(
      value
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0),
    ),
  )
}

/** Hostname without IPv6 brackets, as matched against the allow-list. */
export function hostnameOf(url: URL): string {
  return url.hostname.replace(/^\[(.*)\]$/, '$1')
}
