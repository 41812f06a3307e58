export type FilterableResult = {
  title: string
  snippet: string
  domain: string | null
}

export type CandidateFilterOptions = {
  /** Every word must appear in title or snippet */
  include?: string[]
  /** Any word drops the result */
  exclude?: string[]
  allowDomains?: string[]
  denyDomains?: string[]
}

function lowered(values: string[] | undefined): string[] {
  return (values ?? []).map((value) => value.trim().toLowerCase()).filter(Boolean)
}

export function extractDomain(url: string): string | null {
  try {
    const host = new URL(url).hostname
    return host ? host.toLowerCase() : null
  } catch {
    return null
  }
}

export function domainMatches(domain: string, rule: string): boolean {
  return domain === rule || domain.endsWith(rule)
}

export function filterCandidates<T extends FilterableResult>(rows: T[], options: CandidateFilterOptions = {}): T[] {
  const include = lowered(options.include)
  const exclude = lowered(options.exclude)
  const allow = lowered(options.allowDomains)
  const deny = lowered(options.denyDomains)

  return rows.filter((row) => {
    const text = `${row.title} ${row.snippet}`.toLowerCase()
    const domain = (row.domain ?? '').toLowerCase()
    if (allow.length && !allow.some((rule) => domainMatches(domain, rule))) return false
    if (deny.length && deny.some((rule) => domainMatches(domain, rule))) return false
    if (include.length && !include.every((word) => text.includes(word))) return false
    if (exclude.length && exclude.some((word) => text.includes(word))) return false
    return true
  })
}

/** Keeps the first occurrence of each URL, ignoring a trailing slash and the fragment. */
export function dedupeByUrl<T extends { url: string }>(rows: T[]): T[] {
  const seen = new Set<string>()
  const out: T[] = []
  for (const row of rows) {
    const key = row.url.replace(/#.*$/, '').replace(/\/+$/, '')
    if (!key || seen.has(key)) continue
    seen.add(key)
    out.push(row)
  }
  return out
}
