import type { AniListAnime, LibraryEntry } from '../../../types'
import * as anilist from '../../../main/anilist'
import type { ConfigManager } from '../../../main/config'
import * as database from '../../../main/database'
import { MpvPlayer } from '../../../main/player/mpv'
import { AllAnimeProvider } from '../../../main/providers'
import { startStream, type StreamOutcome } from '../../../main/session'
import type { StreamOptions } from '../state'

/** Everything the terminal UI reaches outside of itself */
export interface TuiServices {
  trending(): Promise<AniListAnime[]>
  popular(): Promise<AniListAnime[]>
  search(query: string): Promise<AniListAnime[]>
  library(): AniListAnime[]
  stream(
    media: AniListAnime,
    episode: number,
    log: (message: string) => void
  ): Promise<StreamOutcome | null>
  saveOptions(options: StreamOptions): void
}

/** Library rows only carry what was stored locally */
export function libraryEntryToAnime(entry: LibraryEntry): AniListAnime {
  return {
    id: entry.anilistId,
    title: { romaji: entry.title, english: null, native: null },
    description: null,
    episodes: entry.episodesTotal,
    format: null,
    status: null,
    season: null,
    seasonYear: null,
    genres: [],
    averageScore: entry.score,
    popularity: null,
    studios: [],
    nextAiringEpisode: null
  }
}

export function createServices(manager: ConfigManager): TuiServices {
  return {
    trending: async () => (await anilist.getTrendingAnime()).media,
    popular: async () => (await anilist.getPopularAnime()).media,
    search: async (query) => (await anilist.searchAnime(query)).media,
    library: () => database.getLibrary().map(libraryEntryToAnime),

    stream: (media, episode, log) => {
      const { config, auth } = manager
      return startStream(media, episode, {
        provider: new AllAnimeProvider(config.stream.translationType, config.stream.quality),
        player: new MpvPlayer({ binary: config.stream.player, stdio: 'ignore', ...config.player }),
        library: database,
        anilist,
        config,
        auth,
        log
      })
    },

    saveOptions: (options) => {
      manager.config.stream.quality = options.quality
      manager.config.stream.translationType = options.translationType
      manager.saveConfig()
    }
  }
}
