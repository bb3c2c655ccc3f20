import type { AniListAnime, AniListPage, AniListViewer, WatchStatus } from '../types'
import { asNumber, asString, asStringArray, field, isRecord } from './json'

const ANILIST_API = 'https://graphql.anilist.co'

export class AniListError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message)
    this.name = 'AniListError'
  }
}

// ─── In-memory cache ─────────────────────────────────────────
// Public queries only; anything sent with a token is never cached.

interface CacheEntry<T> {
  data: T
  expiresAt: number
}

const cache = new Map<string, CacheEntry<AniListPage>>()

const DEFAULT_TTL = 5 * 60 * 1000 // 5 minutes

function getCached(key: string): AniListPage | null {
  const entry = cache.get(key)
  if (!entry) return null
  if (Date.now() > entry.expiresAt) {
    cache.delete(key)
    return null
  }
  return entry.data
}

function setCache(key: string, data: AniListPage, ttl = DEFAULT_TTL): void {
  cache.set(key, { data, expiresAt: Date.now() + ttl })
}

export function clearCache(): void {
  cache.clear()
}

function makeCacheKey(prefix: string, vars: Record<string, unknown>): string {
  return `${prefix}:${JSON.stringify(vars)}`
}

const ANIME_FRAGMENT = `
  fragment AnimeFields on Media {
    id
    title { romaji english native }
    description(asHtml: false)
    episodes
    format
    status
    season
    seasonYear
    genres
    averageScore
    popularity
    studios(isMain: true) { nodes { name } }
    nextAiringEpisode { airingAt episode }
  }
`

// ─── Response parsing ────────────────────────────────────────

export function parseAnime(value: unknown): AniListAnime | null {
  const id = asNumber(field(value, 'id'))
  if (id === null) return null

  const studios = field(value, 'studios', 'nodes')
  const airingAt = asNumber(field(value, 'nextAiringEpisode', 'airingAt'))
  const airingEpisode = asNumber(field(value, 'nextAiringEpisode', 'episode'))

  return {
    id,
    title: {
      romaji: asString(field(value, 'title', 'romaji')),
      english: asString(field(value, 'title', 'english')),
      native: asString(field(value, 'title', 'native'))
    },
    description: asString(field(value, 'description')),
    episodes: asNumber(field(value, 'episodes')),
    format: asString(field(value, 'format')),
    status: asString(field(value, 'status')),
    season: asString(field(value, 'season')),
    seasonYear: asNumber(field(value, 'seasonYear')),
    genres: asStringArray(field(value, 'genres')),
    averageScore: asNumber(field(value, 'averageScore')),
    popularity: asNumber(field(value, 'popularity')),
    studios: Array.isArray(studios)
      ? studios.map((s) => asString(field(s, 'name'))).filter((s): s is string => s !== null)
      : [],
    nextAiringEpisode:
      airingAt !== null && airingEpisode !== null ? { airingAt, episode: airingEpisode } : null
  }
}

function parsePage(value: unknown): AniListPage {
  const media = field(value, 'media')
  return {
    pageInfo: {
      total: asNumber(field(value, 'pageInfo', 'total')) ?? 0,
      currentPage: asNumber(field(value, 'pageInfo', 'currentPage')) ?? 1,
      hasNextPage: field(value, 'pageInfo', 'hasNextPage') === true
    },
    media: Array.isArray(media)
      ? media.map(parseAnime).filter((m): m is AniListAnime => m !== null)
      : []
  }
}

/** English title first, then romaji, then native */
export function preferredTitle(anime: AniListAnime): string {
  return anime.title.english ?? anime.title.romaji ?? anime.title.native ?? 'Unknown Title'
}

// ─── Transport ───────────────────────────────────────────────

async function anilistQuery(
  query: string,
  variables: Record<string, unknown> = {},
  token?: string
): Promise<unknown> {
  const maxRetries = 3
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json'
  }
  if (token) headers.Authorization = `Bearer ${token}`

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const response = await fetch(ANILIST_API, {
      method: 'POST',
      headers,
      body: JSON.stringify({ query, variables })
    })

    // AniList returns 429 with Retry-After; cap the wait at 5s
    if (response.status === 429) {
      const retryAfter = parseInt(response.headers.get('Retry-After') || '0', 10)
      const delay = Math.min(Math.max(retryAfter, attempt) * 1000, 5000)
      console.warn(`[AniList] Rate limited (429), retrying in ${delay}ms (attempt ${attempt}/${maxRetries})`)
      if (attempt < maxRetries) {
        await new Promise((r) => setTimeout(r, delay))
        continue
      }
    }

    const json: unknown = await response.json().catch(() => null)
    const errors = field(json, 'errors')
    const firstError = Array.isArray(errors) ? asString(field(errors[0], 'message')) : null

    if (!response.ok) {
      throw new AniListError(
        `AniList API error: ${response.status} ${firstError ?? response.statusText}`,
        response.status
      )
    }
    if (firstError) {
      throw new AniListError(`AniList query error: ${firstError}`, response.status)
    }

    const data = field(json, 'data')
    if (!isRecord(data)) throw new AniListError('AniList response had no data', response.status)
    return data
  }

  throw new AniListError('AniList API: max retries exceeded (rate limited)', 429)
}

async function pageQuery(
  prefix: string,
  gql: string,
  vars: Record<string, unknown>,
  ttl = DEFAULT_TTL
): Promise<AniListPage> {
  const key = makeCacheKey(prefix, vars)
  const cached = getCached(key)
  if (cached) return cached

  const data = await anilistQuery(`${gql}\n${ANIME_FRAGMENT}`, vars)
  const result = parsePage(field(data, 'Page'))
  setCache(key, result, ttl)
  return result
}

// ─── Browsing ────────────────────────────────────────────────

export function searchAnime(query: string, page = 1, perPage = 20): Promise<AniListPage> {
  const gql = `
    query ($search: String, $page: Int, $perPage: Int) {
      Page(page: $page, perPage: $perPage) {
        pageInfo { total currentPage hasNextPage }
        media(search: $search, type: ANIME, sort: POPULARITY_DESC) {
          ...AnimeFields
        }
      }
    }
  `
  return pageQuery('search', gql, { search: query, page, perPage }, 2 * 60 * 1000)
}

export function getTrendingAnime(page = 1, perPage = 20): Promise<AniListPage> {
  const gql = `
    query ($page: Int, $perPage: Int) {
      Page(page: $page, perPage: $perPage) {
        pageInfo { total currentPage hasNextPage }
        media(type: ANIME, sort: TRENDING_DESC) {
          ...AnimeFields
        }
      }
    }
  `
  return pageQuery('trending', gql, { page, perPage })
}

export function getPopularAnime(page = 1, perPage = 20): Promise<AniListPage> {
  const gql = `
    query ($page: Int, $perPage: Int) {
      Page(page: $page, perPage: $perPage) {
        pageInfo { total currentPage hasNextPage }
        media(type: ANIME, sort: POPULARITY_DESC) {
          ...AnimeFields
        }
      }
    }
  `
  return pageQuery('popular', gql, { page, perPage })
}

// ─── Account ─────────────────────────────────────────────────

export async function getViewer(token: string): Promise<AniListViewer> {
  const data = await anilistQuery('query { Viewer { id name } }', {}, token)
  const id = asNumber(field(data, 'Viewer', 'id'))
  const name = asString(field(data, 'Viewer', 'name'))
  if (id === null || name === null) throw new AniListError('AniList returned no viewer', 200)
  return { id, name }
}

/** `null` when the anime isn't on the user's list */
export async function getUserProgress(
  token: string,
  mediaId: number,
  userName: string
): Promise<number | null> {
  const gql = `
    query ($mediaId: Int, $userName: String) {
      MediaList(mediaId: $mediaId, userName: $userName) { id progress status }
    }
  `
  try {
    const data = await anilistQuery(gql, { mediaId, userName }, token)
    return asNumber(field(data, 'MediaList', 'progress'))
  } catch (err) {
    if (err instanceof AniListError && err.status === 404) return null
    throw err
  }
}

export async function updateUserEntry(
  token: string,
  mediaId: number,
  progress: number,
  status: WatchStatus
): Promise<void> {
  const gql = `
    mutation ($mediaId: Int, $progress: Int, $status: MediaListStatus) {
      SaveMediaListEntry(mediaId: $mediaId, progress: $progress, status: $status) { id progress status }
    }
  `
  await anilistQuery(gql, { mediaId, progress, status }, token)
  console.log(`[AniList] Updated media ${mediaId} to episode ${progress} (${status})`)
}

// ─── Helpers ─────────────────────────────────────────────────

export function stripHtml(html: string | null): string {
  if (!html) return ''
  return html.replace(/<[^>]*>/g, '').replace(/&nbsp;/g, ' ').trim()
}
