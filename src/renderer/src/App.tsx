import { useEffect, useReducer } from 'react'
import { Box, useApp, useInput } from 'ink'
import AnimeDetails from './components/AnimeDetails'
import MenuList from './components/MenuList'
import SearchBar from './components/SearchBar'
import StatusBar from './components/StatusBar'
import StreamLog from './components/StreamLog'
import type { AniListAnime } from '../../types'
import type { TuiServices } from './services'
import {
  cycleOption,
  initialState,
  listItems,
  listTitle,
  reducer,
  resolveSelection,
  type StreamOptions
} from './state'

interface AppProps {
  services: TuiServices
  initialOptions: StreamOptions
  username?: string | null
}

const SOURCE_TITLES = { trending: 'Trending', popular: 'Popular', library: 'Library' } as const

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export default function App({ services, initialOptions, username = null }: AppProps): JSX.Element {
  const { exit } = useApp()
  const [state, dispatch] = useReducer(reducer, initialOptions, initialState)

  useEffect(() => {
    if (!state.running) exit()
  }, [state.running, exit])

  function run(task: () => Promise<void>): void {
    task().catch((err: unknown) => {
      console.error('[TUI] Action failed:', err)
      dispatch({ type: 'loadFailed', error: errorMessage(err) })
    })
  }

  async function load(source: keyof typeof SOURCE_TITLES): Promise<void> {
    dispatch({ type: 'loadStarted', message: `Loading ${SOURCE_TITLES[source]}...` })
    const media =
      source === 'trending'
        ? await services.trending()
        : source === 'popular'
          ? await services.popular()
          : services.library()
    dispatch({ type: 'loadCompleted', media, title: SOURCE_TITLES[source] })
  }

  async function search(query: string): Promise<void> {
    dispatch({ type: 'loadStarted', message: `Searching for "${query}"...` })
    const media = await services.search(query)
    dispatch({ type: 'loadCompleted', media, title: null })
  }

  async function stream(media: AniListAnime, episode: number): Promise<void> {
    dispatch({ type: 'streamStarted' })
    try {
      const outcome = await services.stream(media, episode, (message) =>
        dispatch({ type: 'streamLog', message })
      )
      dispatch({
        type: 'streamFinished',
        message: outcome
          ? `Episode ${outcome.episode}: ${outcome.watchedPercent.toFixed(1)}% watched` +
            (outcome.synced ? ', synced to AniList' : '')
          : 'No stream found'
      })
    } catch (err) {
      console.error('[TUI] Stream failed:', err)
      dispatch({ type: 'streamFinished', message: `Stream failed: ${errorMessage(err)}` })
    }
  }

  function select(): void {
    const intent = resolveSelection(state)
    switch (intent.kind) {
      case 'quit':
        dispatch({ type: 'quit' })
        break
      case 'load':
        run(() => load(intent.source))
        break
      case 'focusSearch':
        dispatch({ type: 'focusSearch' })
        break
      case 'open':
        dispatch({ type: 'open', mode: intent.mode, media: intent.media })
        break
      case 'stream':
        run(() => stream(intent.media, intent.episode))
        break
      case 'cycleOption': {
        const options = cycleOption(state.options, intent.index)
        services.saveOptions(options)
        dispatch({ type: 'setOptions', options })
        break
      }
      case 'none':
        break
    }
  }

  useInput((input, key) => {
    // mpv owns the user's attention until it exits
    if (state.streaming || state.loading) return

    if (state.focus === 'search') {
      if (input === '/' || key.escape) {
        dispatch({ type: 'toggleFocus' })
      } else if (key.return) {
        const query = state.searchQuery.trim()
        if (query) run(() => search(query))
      } else if (key.backspace || key.delete) {
        dispatch({ type: 'deleteChar' })
      } else if (input && !key.ctrl && !key.meta) {
        dispatch({ type: 'typeChar', char: input })
      }
      return
    }

    if (input === 'q') dispatch({ type: 'quit' })
    else if (input === '/') dispatch({ type: 'toggleFocus' })
    else if (input === 'j' || key.downArrow) dispatch({ type: 'moveDown' })
    else if (input === 'k' || key.upArrow) dispatch({ type: 'moveUp' })
    else if (input === 'J' || key.pageDown) dispatch({ type: 'jumpDown' })
    else if (input === 'K' || key.pageUp) dispatch({ type: 'jumpUp' })
    else if (key.return) select()
    else if (key.escape || key.backspace || key.delete) dispatch({ type: 'goBack' })
  })

  return (
    <Box flexDirection="column">
      <SearchBar query={state.searchQuery} focused={state.focus === 'search'} />
      <Box>
        {state.mode.kind === 'streamLog' ? (
          <StreamLog lines={state.streamLogs} />
        ) : (
          <MenuList
            title={listTitle(state.mode)}
            items={listItems(state)}
            selected={state.selected}
            active={state.focus === 'list'}
          />
        )}
        {state.activeMedia && state.mode.kind !== 'streamLog' && (
          <AnimeDetails anime={state.activeMedia} />
        )}
      </Box>
      <StatusBar
        status={state.status}
        loading={state.loading}
        options={state.options}
        username={username}
      />
    </Box>
  )
}
