import type { PlaybackRequest } from '../player/types'
import { findBestMatch, simplifyTitle } from './matching'
import {
  EpisodeNotFoundError,
  type ProviderResult,
  type SourceCandidate,
  type StreamProvider
} from './types'

export { AllAnimeProvider } from './allanime'
export { findBestMatch } from './matching'
export { EpisodeNotFoundError } from './types'
export type {
  ProviderResult,
  SourceCandidate,
  StreamProvider,
  StreamQuality,
  TranslationType
} from './types'

/** Source labels known to extract reliably, best first */
export const DEFAULT_SOURCE_PRIORITY: readonly string[] = [
  'S-mp4',
  'Luf-mp4',
  'Luf-Mp4',
  'Sak',
  'Default',
  'Yt-mp4'
]

// ─── Source selection ─────────────────────────────────────────

/**
 * The first priority label with any matching candidate wins, even when a
 * lower-priority candidate comes earlier in the list. `null` when no
 * candidate carries a preferred label.
 */
export function selectPreferredSource(
  candidates: SourceCandidate[],
  priority: readonly string[] = DEFAULT_SOURCE_PRIORITY
): SourceCandidate | null {
  for (const label of priority) {
    const match = candidates.find((c) => c.sourceName === label)
    if (match) return match
  }
  return null
}

/**
 * Extraction order: preferred labels in priority order, then everything
 * else in the order the provider returned it.
 */
export function rankSources(
  candidates: SourceCandidate[],
  priority: readonly string[] = DEFAULT_SOURCE_PRIORITY
): SourceCandidate[] {
  const ranked: SourceCandidate[] = []
  let remaining = candidates
  let pick = selectPreferredSource(remaining, priority)
  while (pick) {
    ranked.push(pick)
    remaining = remaining.filter((c) => c !== pick)
    pick = selectPreferredSource(remaining, priority)
  }
  return [...ranked, ...remaining]
}

export interface ProviderShow {
  id: string
  name: string
}

export interface ResolvedStream {
  request: PlaybackRequest
  /** Label of the candidate that extracted */
  source: string
}

/**
 * Resolve a playable stream for one episode. `null` when the episode doesn't
 * exist or none of its sources extract; other provider failures propagate.
 */
export async function resolveEpisodeStream(
  provider: StreamProvider,
  show: ProviderShow,
  episode: number,
  priority: readonly string[] = DEFAULT_SOURCE_PRIORITY
): Promise<ResolvedStream | null> {
  let candidates: SourceCandidate[]
  try {
    candidates = await provider.getEpisodeSources(show.id, String(episode))
  } catch (err) {
    if (err instanceof EpisodeNotFoundError) return null
    throw err
  }

  for (const candidate of rankSources(candidates, priority)) {
    try {
      const request = await provider.extractStream(candidate.sourceUrl)
      return {
        request: { ...request, title: `${show.name} - Episode ${episode}` },
        source: candidate.sourceName
      }
    } catch (err) {
      console.warn(
        `[Provider] ${candidate.sourceName} failed for episode ${episode}: ${(err as Error).message}`
      )
    }
  }

  return null
}

// ─── Show lookup ──────────────────────────────────────────────

export interface ShowQuery {
  anilistId: number
  title: string
  titleEnglish: string | null
}

export interface ProviderMappingStore {
  getProviderMapping(anilistId: number, provider: string): ProviderShow | null
  setProviderMapping(anilistId: number, provider: string, show: ProviderShow): void
}

/**
 * Given an AniList entry, find the matching show on the provider.
 *
 * 1. Check the cached mapping (AniList ID → provider show)
 * 2. Otherwise search by each title, then by simplified titles
 * 3. Cache the best match
 */
export async function findProviderShow(
  provider: StreamProvider,
  query: ShowQuery,
  store: ProviderMappingStore,
  translationType: 'sub' | 'dub' = 'sub'
): Promise<ProviderShow | null> {
  const cached = store.getProviderMapping(query.anilistId, provider.name)
  if (cached) return cached

  console.log(`[Provider] No cached mapping for AniList ID ${query.anilistId}, searching...`)

  const searchTerms = [query.titleEnglish, query.title].filter(
    (t, i, all): t is string => !!t && all.indexOf(t) === i
  )
  const simplified = searchTerms
    .map(simplifyTitle)
    .filter((t, i, all) => t !== '' && !searchTerms.includes(t) && all.indexOf(t) === i)

  let best: ProviderResult | null = null
  for (const term of [...searchTerms, ...simplified]) {
    const results = await provider.search(term)
    best = findBestMatch(results, query.title, query.titleEnglish, translationType)
    if (best) break
  }

  if (!best) return null

  const show = { id: best.id, name: best.title }
  store.setProviderMapping(query.anilistId, provider.name, show)
  console.log(`[Provider] Mapped AniList ${query.anilistId} → ${provider.name}/${show.id}`)
  return show
}
