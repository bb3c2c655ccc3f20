#!/usr/bin/env node
import { createInterface } from 'readline/promises'
import { parseArgs } from 'util'
import { createServices, runTui } from '../renderer/src'
import * as anilist from './anilist'
import { ConfigManager, resolveConfigDir, resolveDataDir } from './config'
import * as database from './database'
import {
  forgetProviderShow,
  listLibrary,
  parseAnilistId,
  parseWatchStatus,
  removeFromLibrary,
  setStatus,
  showProgress
} from './library'
import { MpvPlayer } from './player/mpv'
import { AllAnimeProvider } from './providers'
import { startStream, syncDirtyEntries } from './session'
import type { WatchStatus } from '../types'

const USAGE = `Usage: animpv [command] [options]

Commands:
  tui                        Browse AniList and stream (default)
  play <title> [-e N]        Stream episode N (default 1) of the best match for <title>
  auth [token] [--logout]    Store an AniList access token, or remove it
  sync                       Send progress recorded offline to AniList
  library [-s STATUS]        List the local library
  status <id> <STATUS>       Set the watch status of a library entry
  remove <id>                Remove an entry and its progress from the library
  progress <id> [-e N]       Show watched episodes of a library entry

Options:
  -e, --episode <n>          Episode to start from, or to show progress for
  -s, --status <status>      CURRENT, PLANNING, COMPLETED, DROPPED, PAUSED or REPEATING
      --rematch              Search the provider again instead of using the cached show
  -h, --help                 Show this help`

const TOKEN_HELP =
  'Create an AniList access token (https://anilist.co/settings/developer) and paste it below.'

// ─── Argument parsing ─────────────────────────────────────────

export type Command =
  | { name: 'tui' }
  | { name: 'play'; title: string; episode: number; rematch: boolean }
  | { name: 'auth'; token: string | null; logout: boolean }
  | { name: 'sync' }
  | { name: 'library'; status: WatchStatus | null }
  | { name: 'status'; anilistId: number; status: WatchStatus }
  | { name: 'remove'; anilistId: number }
  | { name: 'progress'; anilistId: number; episode: number | null }
  | { name: 'help' }

function parseEpisode(value: string): number {
  const episode = Number(value)
  if (!Number.isInteger(episode) || episode < 1) {
    throw new Error(`Episode must be a positive integer, got "${value}"`)
  }
  return episode
}

export function parseCommand(argv: string[]): Command {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      episode: { type: 'string', short: 'e' },
      status: { type: 'string', short: 's' },
      rematch: { type: 'boolean', default: false },
      logout: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  })

  if (values.help) return { name: 'help' }

  const [command = 'tui', ...rest] = positionals
  switch (command) {
    case 'tui':
      return { name: 'tui' }
    case 'play': {
      const title = rest.join(' ').trim()
      if (!title) throw new Error('play needs a title, e.g. animpv play "Frieren"')
      const episode = parseEpisode(values.episode ?? '1')
      return { name: 'play', title, episode, rematch: values.rematch === true }
    }
    case 'auth':
      return { name: 'auth', token: rest[0] ?? null, logout: values.logout === true }
    case 'sync':
      return { name: 'sync' }
    case 'library':
      return { name: 'library', status: values.status ? parseWatchStatus(values.status) : null }
    case 'status': {
      const [id, status] = rest
      if (!status) throw new Error('status needs an AniList ID and a status, e.g. animpv status 1 COMPLETED')
      return { name: 'status', anilistId: parseAnilistId(id), status: parseWatchStatus(status) }
    }
    case 'remove':
      return { name: 'remove', anilistId: parseAnilistId(rest[0]) }
    case 'progress':
      return {
        name: 'progress',
        anilistId: parseAnilistId(rest[0]),
        episode: values.episode ? parseEpisode(values.episode) : null
      }
    default:
      throw new Error(`Unknown command "${command}"\n\n${USAGE}`)
  }
}

// ─── Commands ─────────────────────────────────────────────────

const print = (line: string): void => console.log(line)

async function runPlay(
  manager: ConfigManager,
  title: string,
  episode: number,
  rematch: boolean
): Promise<void> {
  const { media } = await anilist.searchAnime(title, 1, 5)
  const match = media[0]
  if (!match) throw new Error(`No anime found for "${title}"`)
  if (rematch) forgetProviderShow(match.id)

  const { config, auth } = manager
  const outcome = await startStream(match, episode, {
    provider: new AllAnimeProvider(config.stream.translationType, config.stream.quality),
    player: new MpvPlayer({ binary: config.stream.player, ...config.player }),
    library: database,
    anilist,
    config,
    auth,
    log: print
  })

  if (!outcome) throw new Error(`Could not play ${anilist.preferredTitle(match)}`)
  console.log(
    `Finished on episode ${outcome.episode} (${outcome.watchedPercent.toFixed(1)}% watched)`
  )
}

async function runAuth(manager: ConfigManager, token: string | null, logout: boolean): Promise<void> {
  if (logout) {
    manager.logout()
    console.log('Logged out of AniList.')
    return
  }

  let input = token
  if (!input) {
    console.log(TOKEN_HELP)
    const rl = createInterface({ input: process.stdin, output: process.stdout })
    try {
      input = await rl.question('Token: ')
    } finally {
      rl.close()
    }
  }

  const name = await manager.verifyAndSaveToken(input, anilist.getViewer)
  console.log(`Logged in as ${name}.`)
}

async function runSync(manager: ConfigManager): Promise<void> {
  const updated = await syncDirtyEntries({
    library: database,
    anilist,
    auth: manager.auth,
    log: print
  })
  console.log(updated === 1 ? 'Updated 1 entry.' : `Updated ${updated} entries.`)
}

async function runCommand(command: Command): Promise<void> {
  if (command.name === 'help') {
    console.log(USAGE)
    return
  }

  const manager = ConfigManager.load(resolveConfigDir())
  if (command.name === 'auth') {
    await runAuth(manager, command.token, command.logout)
    return
  }

  await database.initDatabase(resolveDataDir())
  try {
    switch (command.name) {
      case 'tui':
        await runTui(
          createServices(manager),
          {
            quality: manager.config.stream.quality,
            translationType: manager.config.stream.translationType
          },
          manager.auth.username
        )
        break
      case 'play':
        await runPlay(manager, command.title, command.episode, command.rematch)
        break
      case 'sync':
        await runSync(manager)
        break
      case 'library':
        listLibrary(command.status, print)
        break
      case 'status':
        setStatus(command.anilistId, command.status, print)
        break
      case 'remove':
        removeFromLibrary(command.anilistId, print)
        break
      case 'progress':
        showProgress(command.anilistId, command.episode, print)
        break
    }
  } finally {
    database.closeDatabase()
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    await runCommand(parseCommand(argv))
    return 0
  } catch (err) {
    console.error(`animpv: ${(err as Error).message}`)
    return 1
  }
}

if (require.main === module) {
  main().then((code) => {
    process.exitCode = code
  })
}
