import type { AniListAnime } from '../../types'
import { preferredTitle } from '../../main/anilist'
import { QUALITIES, TRANSLATION_TYPES } from '../../main/config'
import type { StreamQuality, TranslationType } from '../../main/providers'

// ─── Model ────────────────────────────────────────────────────

export type ListMode =
  | { kind: 'mainMenu' }
  | { kind: 'searchResults' }
  | { kind: 'animeList'; title: string }
  | { kind: 'animeActions' }
  | { kind: 'episodeSelect' }
  | { kind: 'options' }
  | { kind: 'streamLog' }

export type Focus = 'list' | 'search'

export interface StreamOptions {
  quality: StreamQuality
  translationType: TranslationType
}

interface HistoryFrame {
  mode: ListMode
  selected: number
  activeMedia: AniListAnime | null
}

export interface AppState {
  running: boolean
  focus: Focus
  mode: ListMode
  selected: number
  searchQuery: string
  mediaList: AniListAnime[]
  activeMedia: AniListAnime | null
  history: HistoryFrame[]
  loading: boolean
  streaming: boolean
  status: string | null
  streamLogs: string[]
  options: StreamOptions
}

export const MAIN_MENU = ['Trending', 'Popular', 'Search', 'Library', 'Options', 'Exit'] as const
export const ANIME_ACTIONS = ['Stream', 'Episodes'] as const

export const JUMP_SIZE = 10
export const MAX_STREAM_LOGS = 20
/** Episode list length when AniList doesn't know the count */
export const UNKNOWN_EPISODE_COUNT = 100

export function initialState(options: StreamOptions): AppState {
  return {
    running: true,
    focus: 'list',
    mode: { kind: 'mainMenu' },
    selected: 0,
    searchQuery: '',
    mediaList: [],
    activeMedia: null,
    history: [],
    loading: false,
    streaming: false,
    status: null,
    streamLogs: [],
    options
  }
}

// ─── Derived ──────────────────────────────────────────────────

export function formatMedia(anime: AniListAnime): string {
  const parts = [anime.format, anime.episodes !== null ? `${anime.episodes} eps` : null]
    .filter((p): p is string => !!p)
    .join(', ')
  return parts ? `${preferredTitle(anime)} (${parts})` : preferredTitle(anime)
}

export function episodeCount(state: AppState): number {
  return state.activeMedia?.episodes ?? UNKNOWN_EPISODE_COUNT
}

export function listItems(state: AppState): string[] {
  switch (state.mode.kind) {
    case 'mainMenu':
      return [...MAIN_MENU]
    case 'animeActions':
      return [...ANIME_ACTIONS]
    case 'episodeSelect':
      return Array.from({ length: episodeCount(state) }, (_, i) => `Episode ${i + 1}`)
    case 'options':
      return [
        `Quality: ${state.options.quality}p`,
        `Translation: ${state.options.translationType}`
      ]
    case 'streamLog':
      return []
    case 'searchResults':
    case 'animeList':
      return state.mediaList.map(formatMedia)
  }
}

export function listTitle(mode: ListMode): string {
  switch (mode.kind) {
    case 'mainMenu':
      return 'Main Menu'
    case 'searchResults':
      return 'Search Results'
    case 'animeList':
      return mode.title
    case 'animeActions':
      return 'Actions'
    case 'episodeSelect':
      return 'Episodes'
    case 'options':
      return 'Options'
    case 'streamLog':
      return 'Stream'
  }
}

/** Option at `index` moved to its next value, wrapping around */
export function cycleOption(options: StreamOptions, index: number): StreamOptions {
  const next = <T>(values: readonly T[], current: T): T =>
    values[(values.indexOf(current) + 1) % values.length] ?? current

  if (index === 0) return { ...options, quality: next(QUALITIES, options.quality) }
  if (index === 1) {
    return { ...options, translationType: next(TRANSLATION_TYPES, options.translationType) }
  }
  return options
}

// ─── Selection ────────────────────────────────────────────────
// What Enter on the current row asks for. Side effects happen in the app.

export type Intent =
  | { kind: 'none' }
  | { kind: 'quit' }
  | { kind: 'load'; source: 'trending' | 'popular' | 'library' }
  | { kind: 'focusSearch' }
  | { kind: 'open'; mode: ListMode; media?: AniListAnime }
  | { kind: 'stream'; media: AniListAnime; episode: number }
  | { kind: 'cycleOption'; index: number }

export function resolveSelection(state: AppState): Intent {
  const index = state.selected

  switch (state.mode.kind) {
    case 'mainMenu':
      switch (MAIN_MENU[index]) {
        case 'Trending':
          return { kind: 'load', source: 'trending' }
        case 'Popular':
          return { kind: 'load', source: 'popular' }
        case 'Search':
          return { kind: 'focusSearch' }
        case 'Library':
          return { kind: 'load', source: 'library' }
        case 'Options':
          return { kind: 'open', mode: { kind: 'options' } }
        case 'Exit':
          return { kind: 'quit' }
        default:
          return { kind: 'none' }
      }
    case 'searchResults':
    case 'animeList': {
      const media = state.mediaList[index]
      return media ? { kind: 'open', mode: { kind: 'animeActions' }, media } : { kind: 'none' }
    }
    case 'animeActions': {
      const media = state.activeMedia
      if (!media) return { kind: 'none' }
      if (ANIME_ACTIONS[index] === 'Stream') return { kind: 'stream', media, episode: 1 }
      if (ANIME_ACTIONS[index] === 'Episodes') return { kind: 'open', mode: { kind: 'episodeSelect' } }
      return { kind: 'none' }
    }
    case 'episodeSelect':
      return state.activeMedia
        ? { kind: 'stream', media: state.activeMedia, episode: index + 1 }
        : { kind: 'none' }
    case 'options':
      return { kind: 'cycleOption', index }
    case 'streamLog':
      return { kind: 'none' }
  }
}

// ─── Reducer ──────────────────────────────────────────────────

export type AppAction =
  | { type: 'quit' }
  | { type: 'toggleFocus' }
  | { type: 'focusSearch' }
  | { type: 'moveDown' }
  | { type: 'moveUp' }
  | { type: 'jumpDown' }
  | { type: 'jumpUp' }
  | { type: 'goBack' }
  | { type: 'typeChar'; char: string }
  | { type: 'deleteChar' }
  | { type: 'open'; mode: ListMode; media?: AniListAnime }
  | { type: 'loadStarted'; message: string }
  | { type: 'loadCompleted'; media: AniListAnime[]; title: string | null }
  | { type: 'loadFailed'; error: string }
  | { type: 'setOptions'; options: StreamOptions }
  | { type: 'streamStarted' }
  | { type: 'streamLog'; message: string }
  | { type: 'streamFinished'; message: string }

/** Save where we are and switch to `mode` */
function pushMode(state: AppState, mode: ListMode, resetIndex: boolean): AppState {
  return {
    ...state,
    history: [
      ...state.history,
      { mode: state.mode, selected: state.selected, activeMedia: state.activeMedia }
    ],
    mode,
    selected: resetIndex ? 0 : state.selected
  }
}

function goBack(state: AppState): AppState {
  const frame = state.history[state.history.length - 1]
  if (frame) {
    return {
      ...state,
      history: state.history.slice(0, -1),
      mode: frame.mode,
      selected: frame.selected,
      activeMedia: frame.activeMedia,
      streamLogs: []
    }
  }
  if (state.mode.kind === 'mainMenu') return { ...state, running: false }
  return {
    ...state,
    mode: { kind: 'mainMenu' },
    history: [],
    selected: 0,
    activeMedia: null,
    searchQuery: ''
  }
}

function lastIndex(state: AppState): number {
  return Math.max(listItems(state).length - 1, 0)
}

export function reducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case 'quit':
      return { ...state, running: false }

    case 'toggleFocus':
      return { ...state, focus: state.focus === 'list' ? 'search' : 'list' }

    case 'focusSearch':
      return { ...state, focus: 'search' }

    case 'moveDown':
      return { ...state, selected: state.selected >= lastIndex(state) ? 0 : state.selected + 1 }

    case 'moveUp':
      return { ...state, selected: state.selected === 0 ? lastIndex(state) : state.selected - 1 }

    case 'jumpDown':
      return { ...state, selected: Math.min(state.selected + JUMP_SIZE, lastIndex(state)) }

    case 'jumpUp':
      return { ...state, selected: Math.max(state.selected - JUMP_SIZE, 0) }

    case 'goBack':
      return goBack(state)

    case 'typeChar':
      return { ...state, searchQuery: state.searchQuery + action.char }

    case 'deleteChar':
      return { ...state, searchQuery: state.searchQuery.slice(0, -1) }

    case 'open': {
      const next = pushMode(state, action.mode, true)
      return action.media ? { ...next, activeMedia: action.media } : next
    }

    case 'loadStarted':
      return { ...state, loading: true, status: action.message }

    case 'loadCompleted':
      return {
        ...pushMode(
          state,
          action.title ? { kind: 'animeList', title: action.title } : { kind: 'searchResults' },
          true
        ),
        loading: false,
        status: null,
        mediaList: action.media,
        focus: 'list',
        activeMedia: null
      }

    case 'loadFailed':
      return { ...state, loading: false, status: action.error }

    case 'setOptions':
      return { ...state, options: action.options }

    case 'streamStarted':
      return {
        ...pushMode(state, { kind: 'streamLog' }, false),
        streaming: true,
        status: null,
        streamLogs: ['Starting stream...']
      }

    case 'streamLog':
      return { ...state, streamLogs: [...state.streamLogs, action.message].slice(-MAX_STREAM_LOGS) }

    case 'streamFinished':
      return { ...goBack(state), streaming: false, status: action.message }
  }
}
