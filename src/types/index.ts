// ─── AniList API Types ────────────────────────────────────────

export interface AniListAnime {
  id: number
  title: {
    romaji: string | null
    english: string | null
    native: string | null
  }
  description: string | null
  episodes: number | null
  format: string | null
  status: string | null
  season: string | null
  seasonYear: number | null
  genres: string[]
  averageScore: number | null
  popularity: number | null
  studios: string[]
  nextAiringEpisode: {
    airingAt: number
    episode: number
  } | null
}

export interface AniListPage {
  pageInfo: {
    total: number
    currentPage: number
    hasNextPage: boolean
  }
  media: AniListAnime[]
}

export interface AniListViewer {
  id: number
  name: string
}

// ─── Local Types ──────────────────────────────────────────────

/** Mirrors AniList's MediaListStatus */
export type WatchStatus = 'CURRENT' | 'PLANNING' | 'COMPLETED' | 'DROPPED' | 'PAUSED' | 'REPEATING'

export const WATCH_STATUSES: readonly WatchStatus[] = [
  'CURRENT',
  'PLANNING',
  'COMPLETED',
  'DROPPED',
  'PAUSED',
  'REPEATING'
]

export interface LibraryEntry {
  anilistId: number
  title: string
  status: WatchStatus
  progress: number
  episodesTotal: number | null
  score: number | null
  /** Progress recorded locally that AniList hasn't received yet */
  dirty: boolean
  updatedAt: string
}

export interface EpisodeProgress {
  anilistId: number
  episodeNumber: number
  watchedPercent: number
  completed: boolean
  /** Provider source label */
  source: string | null
  watchedAt: string
}
