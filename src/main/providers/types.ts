import type { PlaybackRequest } from '../player/types'

// ─── Streaming Provider Types ─────────────────────────────────

export type TranslationType = 'sub' | 'dub'

export type StreamQuality = '1080' | '720' | '480'

export interface ProviderResult {
  id: string
  title: string
  availableEpisodes: {
    sub: number
    dub: number
    raw: number
  }
}

/** One way to play an episode, before extraction */
export interface SourceCandidate {
  /** Only used for priority matching */
  sourceName: string
  sourceUrl: string
}

export interface StreamProvider {
  readonly name: string
  search(query: string): Promise<ProviderResult[]>
  getEpisodeSources(showId: string, episode: string): Promise<SourceCandidate[]>
  extractStream(sourceUrl: string): Promise<PlaybackRequest>
}

export class EpisodeNotFoundError extends Error {
  constructor(
    readonly showId: string,
    readonly episode: string
  ) {
    super(`Episode ${episode} not found for show ID ${showId}`)
    this.name = 'EpisodeNotFoundError'
  }
}
