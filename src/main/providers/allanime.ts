import { asNumber, field, isRecord, type JsonRecord } from '../json'
import type { PlaybackRequest } from '../player/types'
import {
  EpisodeNotFoundError,
  type ProviderResult,
  type SourceCandidate,
  type StreamProvider,
  type StreamQuality,
  type TranslationType
} from './types'

// ─── Configuration ────────────────────────────────────────────

const API_ENDPOINT = 'https://api.allanime.day/api'
const CLOCK_BASE_URL = 'https://allanime.day'
const REFERER = 'https://allanime.to/'
const STREAM_REFERER = 'https://allanime.day/'

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

/** Source URLs prefixed with `--` are hex bytes XOR'd with this key */
const SOURCE_URL_KEY = 56

const SEARCH_GQL = `
  query($search: SearchInput, $limit: Int, $page: Int, $translationType: VaildTranslationTypeEnumType, $countryOrigin: VaildCountryOriginEnumType) {
    shows(search: $search, limit: $limit, page: $page, translationType: $translationType, countryOrigin: $countryOrigin) {
      edges {
        _id
        name
        availableEpisodes
      }
    }
  }
`

const EPISODE_GQL = `
  query($showId: String!, $translationType: VaildTranslationTypeEnumType!, $episodeString: String!) {
    episode(showId: $showId, translationType: $translationType, episodeString: $episodeString) {
      sourceUrls
    }
  }
`

// ─── Response narrowing ───────────────────────────────────────

function count(value: unknown): number {
  return asNumber(value) ?? 0
}

function toProviderResult(edge: unknown): ProviderResult | null {
  if (!isRecord(edge)) return null
  const { _id: id, name } = edge
  if (typeof id !== 'string' || typeof name !== 'string') return null
  const episodes = edge.availableEpisodes
  return {
    id,
    title: name,
    availableEpisodes: {
      sub: count(field(episodes, 'sub')),
      dub: count(field(episodes, 'dub')),
      raw: count(field(episodes, 'raw'))
    }
  }
}

function toSourceCandidate(source: unknown): SourceCandidate | null {
  if (!isRecord(source)) return null
  const { sourceName, sourceUrl } = source
  if (typeof sourceName !== 'string' || typeof sourceUrl !== 'string') return null
  return { sourceName, sourceUrl }
}

// ─── De-obfuscation ───────────────────────────────────────────

export function decryptSourceUrl(hex: string): string {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error('Failed to parse hex string')
  }
  let decoded = ''
  for (let i = 0; i < hex.length; i += 2) {
    decoded += String.fromCharCode(parseInt(hex.slice(i, i + 2), 16) ^ SOURCE_URL_KEY)
  }
  return decoded
}

/** `/apivtwo/clock?id=..` → `https://allanime.day/apivtwo/clock.json?id=..` */
export function toClockUrl(path: string): string {
  if (/^https?:\/\//.test(path)) return path.replace('/clock', '/clock.json')
  const base = path.startsWith('/') ? path : `/${path}`
  return `${CLOCK_BASE_URL}${base.replace('/clock', '/clock.json')}`
}

// ─── Provider ─────────────────────────────────────────────────

export class AllAnimeProvider implements StreamProvider {
  readonly name = 'allanime'

  constructor(
    private readonly translationType: TranslationType = 'sub',
    private readonly quality: StreamQuality = '1080'
  ) {}

  private async fetchJson(url: string): Promise<unknown> {
    const res = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, Referer: REFERER }
    })
    if (!res.ok) throw new Error(`HTTP ${res.status} fetching ${url}`)
    return res.json()
  }

  private query(gql: string, variables: JsonRecord): Promise<unknown> {
    const url =
      `${API_ENDPOINT}?variables=${encodeURIComponent(JSON.stringify(variables))}` +
      `&query=${encodeURIComponent(gql)}`
    return this.fetchJson(url)
  }

  async search(query: string): Promise<ProviderResult[]> {
    console.log(`[AllAnime] Searching for "${query}" [${this.translationType}]`)

    const json = await this.query(SEARCH_GQL, {
      search: { allowAdult: false, allowUnknown: false, query },
      limit: 50,
      page: 1,
      translationType: this.translationType,
      countryOrigin: 'ALL'
    })

    const edges = field(json, 'data', 'shows', 'edges')
    if (!Array.isArray(edges)) throw new Error('Unexpected search response from AllAnime')

    const results = edges.map(toProviderResult).filter((r): r is ProviderResult => r !== null)
    console.log(`[AllAnime] Found ${results.length} results`)
    return results
  }

  async getEpisodeSources(showId: string, episode: string): Promise<SourceCandidate[]> {
    const json = await this.query(EPISODE_GQL, {
      showId,
      translationType: this.translationType,
      episodeString: episode
    })

    const data = field(json, 'data')
    if (!isRecord(data)) throw new Error('Unexpected episode response from AllAnime')

    const sourceUrls = field(data.episode, 'sourceUrls')
    if (!Array.isArray(sourceUrls)) {
      console.warn(`[AllAnime] No data for episode ${episode}, it likely doesn't exist`)
      throw new EpisodeNotFoundError(showId, episode)
    }

    const sources = sourceUrls.map(toSourceCandidate).filter((s): s is SourceCandidate => s !== null)
    console.log(`[AllAnime] Found ${sources.length} source URLs for episode ${episode}`)
    return sources
  }

  async extractStream(sourceUrl: string): Promise<PlaybackRequest> {
    const cleanUrl = sourceUrl.startsWith('--') ? decryptSourceUrl(sourceUrl.slice(2)) : sourceUrl
    const headers: [string, string][] = [
      ['User-Agent', USER_AGENT],
      ['Referer', STREAM_REFERER]
    ]

    if (/^https?:\/\//.test(cleanUrl) && !cleanUrl.includes('/clock')) {
      return { url: cleanUrl, headers }
    }

    const clockUrl = toClockUrl(cleanUrl)
    console.log(`[AllAnime] Resolving stream from ${clockUrl}`)

    const json = await this.fetchJson(clockUrl)
    const links = field(json, 'links')
    if (!Array.isArray(links)) throw new Error('No stream links found')

    const playable = links.filter(
      (l): l is { link: string; resolutionStr: unknown } =>
        isRecord(l) && typeof l.link === 'string'
    )
    const best =
      playable.find((l) => l.resolutionStr === `${this.quality}p`) ?? playable[playable.length - 1]
    if (!best) throw new Error('No stream links found')

    return { url: best.link, headers }
  }
}
