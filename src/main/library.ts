import { WATCH_STATUSES, type EpisodeProgress, type LibraryEntry, type WatchStatus } from '../types'
import * as database from './database'

// ─── Parsing ──────────────────────────────────────────────────

export function parseWatchStatus(value: string): WatchStatus {
  const upper = value.toUpperCase()
  const status = WATCH_STATUSES.find((s) => s === upper)
  if (!status) {
    throw new Error(`Unknown status "${value}", expected one of ${WATCH_STATUSES.join(', ')}`)
  }
  return status
}

export function parseAnilistId(value: string | undefined): number {
  const id = Number(value)
  if (!value || !Number.isInteger(id) || id < 1) {
    throw new Error(`Expected an AniList ID, got "${value ?? ''}"`)
  }
  return id
}

// ─── Formatting ───────────────────────────────────────────────

export function formatLibraryEntry(entry: LibraryEntry): string {
  const episodes = `${entry.progress}/${entry.episodesTotal ?? '?'}`
  const pending = entry.dirty ? '  (not synced)' : ''
  return `${entry.anilistId}  ${entry.title}  ${entry.status}  ${episodes}${pending}`
}

export function formatEpisodeProgress(progress: EpisodeProgress): string {
  const watched = progress.completed ? ' watched' : ''
  const source = progress.source ? ` [${progress.source}]` : ''
  return `Episode ${progress.episodeNumber}: ${progress.watchedPercent.toFixed(1)}%${watched}${source}`
}

// ─── Commands ─────────────────────────────────────────────────

function requireEntry(anilistId: number): LibraryEntry {
  const entry = database.getAnime(anilistId)
  if (!entry) throw new Error(`AniList ID ${anilistId} is not in the library`)
  return entry
}

export function listLibrary(status: WatchStatus | null, log: (line: string) => void): void {
  const entries = database.getLibrary(status ?? undefined)
  if (entries.length === 0) {
    log(status ? `No ${status} entries.` : 'The library is empty.')
    return
  }
  for (const entry of entries) log(formatLibraryEntry(entry))
}

export function setStatus(anilistId: number, status: WatchStatus, log: (line: string) => void): void {
  const entry = requireEntry(anilistId)
  database.updateStatus(anilistId, status)
  log(`${entry.title}: ${entry.status} → ${status}`)
}

export function removeFromLibrary(anilistId: number, log: (line: string) => void): void {
  const entry = requireEntry(anilistId)
  database.removeAnime(anilistId)
  log(`Removed ${entry.title}.`)
}

/** Every episode of an entry, or one when `episode` is given */
export function showProgress(
  anilistId: number,
  episode: number | null,
  log: (line: string) => void
): void {
  const entry = requireEntry(anilistId)
  log(formatLibraryEntry(entry))

  if (episode !== null) {
    const progress = database.getEpisodeProgress(anilistId, episode)
    log(progress ? formatEpisodeProgress(progress) : `Episode ${episode}: not watched`)
    return
  }

  const episodes = database.getProgress(anilistId)
  if (episodes.length === 0) log('No episodes watched yet.')
  for (const progress of episodes) log(formatEpisodeProgress(progress))
}

/** Forget the cached provider show so the next stream searches again */
export function forgetProviderShow(anilistId: number): void {
  database.clearProviderMapping(anilistId)
  console.log(`[Library] Cleared provider mapping for AniList ID ${anilistId}`)
}
