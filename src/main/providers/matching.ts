import type { ProviderResult, TranslationType } from './types'

// ─── Title matching ───────────────────────────────────────────

const MIN_MATCH_SCORE = 30

export function normalizeTitle(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}

/** Drops season/part/cour markers and punctuation for a looser second search */
export function simplifyTitle(s: string): string {
  return s
    .replace(/\s*(season|part|cour)\s*\d*/gi, '')
    .replace(/[^a-zA-Z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}

export function scoreTitle(candidate: string, title: string, titleEnglish?: string | null): number {
  const norm = normalizeTitle(candidate)
  const target1 = normalizeTitle(title)
  const target2 = titleEnglish ? normalizeTitle(titleEnglish) : ''

  let score: number
  if (norm === target1 || (target2 && norm === target2)) score = 100
  else if (norm.includes(target1) || target1.includes(norm)) score = 80
  else if (target2 && (norm.includes(target2) || target2.includes(norm))) score = 75
  else {
    const resultWords = norm.split(' ')
    const overlap = (words: string[]): number =>
      words.length > 0 ? words.filter((w) => resultWords.includes(w)).length / words.length : 0
    score = Math.max(overlap(target1.split(' ')), target2 ? overlap(target2.split(' ')) : 0) * 60
  }

  // Much longer titles are usually sequels or spinoffs of the one we want
  const targetLen = target2 ? Math.min(target1.length, target2.length) : target1.length
  const lenDiff = norm.length - targetLen
  if (lenDiff > 0 && score < 100) {
    score -= Math.min(lenDiff * 2, 20)
  }

  return score
}

export function findBestMatch(
  results: ProviderResult[],
  title: string,
  titleEnglish?: string | null,
  translationType: TranslationType = 'sub'
): ProviderResult | null {
  // Shows with no episodes in the wanted translation can't be streamed
  const available = results.filter((r) => r.availableEpisodes[translationType] > 0)
  const candidates = available.length > 0 ? available : results
  if (candidates.length === 0) return null

  const scored = candidates.map((result) => ({
    result,
    score: scoreTitle(result.title, title, titleEnglish)
  }))

  scored.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score
    return normalizeTitle(a.result.title).length - normalizeTitle(b.result.title).length
  })

  const best = scored[0]
  return best && best.score > MIN_MATCH_SCORE ? best.result : null
}
