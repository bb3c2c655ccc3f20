import type { AniListAnime, LibraryEntry, WatchStatus } from '../types'
import { preferredTitle } from './anilist'
import type { AppConfig, AuthConfig } from './config'
import type { AnimeRecord, ProgressRecord } from './database'
import { EpisodeCursor, createEpisodeNavigator } from './navigator'
import type { PlaybackRequest, Player } from './player/types'
import {
  findProviderShow,
  resolveEpisodeStream,
  type ProviderMappingStore,
  type StreamProvider
} from './providers'

// ─── Dependencies ─────────────────────────────────────────────

/** The parts of the library database a stream session writes to */
export interface LibraryStore extends ProviderMappingStore {
  upsertAnime(anime: AnimeRecord): void
  saveEpisodeProgress(progress: ProgressRecord): void
  markDirty(anilistId: number): void
  markSynced(anilistId: number): void
  getDirtyEntries(): LibraryEntry[]
}

export interface ProgressSync {
  getUserProgress(token: string, mediaId: number, userName: string): Promise<number | null>
  updateUserEntry(token: string, mediaId: number, progress: number, status: WatchStatus): Promise<void>
}

export interface SyncDeps {
  library: LibraryStore
  anilist: ProgressSync
  auth: AuthConfig
  log: (message: string) => void
}

export interface StreamDeps extends SyncDeps {
  provider: StreamProvider
  player: Player
  config: AppConfig
}

export interface StreamOutcome {
  /** Episode loaded when the player closed */
  episode: number
  watchedPercent: number
  completed: boolean
  /** AniList received new progress */
  synced: boolean
}

// ─── Progress sync ────────────────────────────────────────────

/**
 * Push `episode` to the user's AniList entry when it is ahead of what AniList
 * has. Anything that can't be sent leaves the local entry dirty.
 */
async function syncProgress(
  anilistId: number,
  episode: number,
  episodesTotal: number | null,
  deps: SyncDeps
): Promise<boolean> {
  const { library, anilist, auth, log } = deps

  if (!auth.anilistToken || !auth.username) {
    library.markDirty(anilistId)
    log('Not logged in to AniList, progress saved locally')
    return false
  }

  try {
    const remote = await anilist.getUserProgress(auth.anilistToken, anilistId, auth.username)
    if (remote !== null && remote >= episode) {
      library.markSynced(anilistId)
      log(`AniList already at episode ${remote}`)
      return false
    }

    const status: WatchStatus =
      episodesTotal !== null && episode >= episodesTotal ? 'COMPLETED' : 'CURRENT'
    await anilist.updateUserEntry(auth.anilistToken, anilistId, episode, status)
    library.markSynced(anilistId)
    log(`Updated AniList progress to episode ${episode}`)
    return true
  } catch (err) {
    library.markDirty(anilistId)
    console.error(`[Stream] AniList sync failed for ${anilistId}:`, err)
    log(`AniList sync failed: ${(err as Error).message}`)
    return false
  }
}

/** Send every locally recorded progress AniList hasn't received; returns how many were updated */
export async function syncDirtyEntries(deps: SyncDeps): Promise<number> {
  if (!deps.auth.anilistToken || !deps.auth.username) {
    throw new Error('Not logged in to AniList, run `animpv auth` first')
  }

  let updated = 0
  for (const entry of deps.library.getDirtyEntries()) {
    if (entry.progress < 1) {
      deps.library.markSynced(entry.anilistId)
      continue
    }
    deps.log(`Syncing ${entry.title} (episode ${entry.progress})`)
    if (await syncProgress(entry.anilistId, entry.progress, entry.episodesTotal, deps)) {
      updated++
    }
  }
  return updated
}

// ─── Streaming ────────────────────────────────────────────────

/**
 * Find `media` on the provider, play `episode` and keep playing whatever the
 * user navigates to. Progress of the episode open when the player closes is
 * stored and synced. `null` when nothing could be played.
 */
export async function startStream(
  media: AniListAnime,
  episode: number,
  deps: StreamDeps
): Promise<StreamOutcome | null> {
  const { provider, player, library, config, log } = deps
  const title = preferredTitle(media)

  log(`Searching ${provider.name} for "${title}"...`)
  const show = await findProviderShow(
    provider,
    { anilistId: media.id, title: media.title.romaji ?? title, titleEnglish: media.title.english },
    library,
    config.stream.translationType
  )
  if (!show) {
    log(`Could not find "${title}" on ${provider.name}`)
    return null
  }

  library.upsertAnime({
    anilistId: media.id,
    title,
    episodesTotal: media.episodes,
    score: media.averageScore
  })

  const sources = new Map<number, string>()
  const resolveEpisode = async (n: number): Promise<PlaybackRequest | null> => {
    const resolved = await resolveEpisodeStream(provider, show, n, config.stream.sourcePriority)
    if (!resolved) return null
    sources.set(n, resolved.source)
    return resolved.request
  }

  log(`Fetching episode ${episode}...`)
  const request = await resolveEpisode(episode)
  if (!request) {
    log('No stream found')
    return null
  }

  const cursor = new EpisodeCursor(episode)
  const navigator = createEpisodeNavigator(cursor, (n) => {
    log(`Fetching episode ${n}...`)
    return resolveEpisode(n)
  })

  log(`Playing ${request.title ?? title}`)
  const watchedPercent = await player.play(request, navigator)
  const finalEpisode = cursor.current
  const completed = watchedPercent >= config.stream.episodeCompleteAt

  log(`Player closed on episode ${finalEpisode} at ${watchedPercent.toFixed(1)}%`)
  library.saveEpisodeProgress({
    anilistId: media.id,
    episodeNumber: finalEpisode,
    watchedPercent,
    completed,
    source: sources.get(finalEpisode) ?? null
  })

  const synced = completed
    ? await syncProgress(media.id, finalEpisode, media.episodes, deps)
    : false

  return { episode: finalEpisode, watchedPercent, completed, synced }
}
