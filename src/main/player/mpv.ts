import { spawn } from 'child_process'
import { randomBytes } from 'crypto'
import { once, type EventEmitter } from 'events'
import { existsSync, unlinkSync } from 'fs'
import { createConnection } from 'net'
import { tmpdir } from 'os'
import { join } from 'path'
import { createInterface } from 'readline'
import type { Duplex } from 'stream'
import {
  encodeCommand,
  keybindCommands,
  loadFileCommand,
  observePositionCommand,
  parsePlayerMessage,
  setHeadersCommand,
  setStartCommand,
  setSubtitlesCommand,
  setTitleCommand,
  showTextCommand,
  type IpcValue
} from './ipc'
import {
  ProcessSpawnError,
  type EpisodeNavigator,
  type NavigationAction,
  type PlaybackRequest,
  type Player
} from './types'

// ─── Defaults ─────────────────────────────────────────────────
// mpv needs a moment after launch before its IPC server is listening.

export const DEFAULT_CONNECT_ATTEMPTS = 20
export const DEFAULT_CONNECT_RETRY_MS = 100
export const DEFAULT_POLL_INTERVAL_MS = 100

const STATUS_MSG = 'Status: ${time-pos} / ${duration} (${percent-pos}%)'

/** The parts of a child process the player relies on */
export interface PlayerProcess extends EventEmitter {
  readonly exitCode: number | null
  readonly signalCode: NodeJS.Signals | null
}

export interface MpvPlayerOptions {
  binary?: string
  socketDir?: string
  connectAttempts?: number
  connectRetryMs?: number
  pollIntervalMs?: number
  /** `ignore` keeps mpv's terminal output away from a full-screen UI */
  stdio?: 'inherit' | 'ignore'
  spawnProcess?: (binary: string, args: string[]) => PlayerProcess
  connectSocket?: (path: string) => Promise<Duplex>
}

type LoopEvent = { kind: 'line'; line: string } | { kind: 'closed' } | { kind: 'tick' }

const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms))

function defaultConnect(path: string): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(path)
    socket.once('connect', () => {
      socket.off('error', reject)
      resolve(socket)
    })
    socket.once('error', reject)
  })
}

function createSocketPath(dir: string): string {
  const id = randomBytes(4).readUInt32BE(0)
  const name = `animpv-mpv-${id}`
  return process.platform === 'win32' ? `\\\\.\\pipe\\${name}` : join(dir, `${name}.sock`)
}

export function buildMpvArgs(request: PlaybackRequest, socketPath: string): string[] {
  const args = [
    '--force-window=yes',
    '--keep-open=yes',
    `--input-ipc-server=${socketPath}`,
    '--term-osd-bar',
    `--term-status-msg=${STATUS_MSG}`
  ]

  const headers = (request.headers ?? []).map(([name, value]) => `${name}: ${value}`).join(',')
  if (headers) args.push(`--http-header-fields=${headers}`)
  if (request.title) args.push(`--title=${request.title}`)
  if (request.startTime) args.push(`--start=${request.startTime}`)
  for (const subtitle of request.subtitles ?? []) {
    args.push(`--sub-file=${subtitle}`)
  }

  args.push(request.url)
  return args
}

/**
 * Drives an external mpv process over its JSON IPC socket. Navigation key
 * presses inside mpv are turned into navigator calls and the resulting
 * stream is swapped into the running player.
 */
export class MpvPlayer implements Player {
  private readonly binary: string
  private readonly socketDir: string
  private readonly connectAttempts: number
  private readonly connectRetryMs: number
  private readonly pollIntervalMs: number
  private readonly spawnProcess: (binary: string, args: string[]) => PlayerProcess
  private readonly connectSocket: (path: string) => Promise<Duplex>

  constructor(options: MpvPlayerOptions = {}) {
    this.binary = options.binary ?? 'mpv'
    this.socketDir = options.socketDir ?? tmpdir()
    this.connectAttempts = options.connectAttempts ?? DEFAULT_CONNECT_ATTEMPTS
    this.connectRetryMs = options.connectRetryMs ?? DEFAULT_CONNECT_RETRY_MS
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    const stdio = options.stdio ?? 'inherit'
    this.spawnProcess =
      options.spawnProcess ?? ((binary, args) => spawn(binary, args, { stdio }))
    this.connectSocket = options.connectSocket ?? defaultConnect
  }

  async play(request: PlaybackRequest, navigator?: EpisodeNavigator): Promise<number> {
    const socketPath = createSocketPath(this.socketDir)
    const args = buildMpvArgs(request, socketPath)

    console.log(`[Player] Starting ${this.binary} (IPC: ${socketPath})`)

    let child: PlayerProcess
    try {
      child = this.spawnProcess(this.binary, args)
      await once(child, 'spawn')
    } catch (err) {
      throw new ProcessSpawnError(this.binary, err)
    }

    let exited = false
    const exit = new Promise<void>((resolve) => {
      child.once('exit', () => {
        exited = true
        resolve()
      })
    })
    if (child.exitCode !== null || child.signalCode !== null) exited = true
    child.on('error', (err: Error) => {
      console.error(`[Player] ${this.binary} process error: ${err.message}`)
    })

    let maxPercent = 0
    try {
      const socket = await this.connect(socketPath, () => exited)
      if (socket) {
        maxPercent = await this.runEventLoop(socket, navigator, () => exited)
      } else {
        console.warn('[Player] IPC channel unavailable, episode navigation disabled')
      }
    } finally {
      if (!exited) await exit
      if (existsSync(socketPath)) {
        try {
          unlinkSync(socketPath)
        } catch (err) {
          console.warn(`[Player] Could not remove ${socketPath}: ${(err as Error).message}`)
        }
      }
    }

    return maxPercent
  }

  private async connect(socketPath: string, hasExited: () => boolean): Promise<Duplex | null> {
    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      if (hasExited()) return null
      try {
        return await this.connectSocket(socketPath)
      } catch {
        await sleep(this.connectRetryMs)
      }
    }
    return null
  }

  private async runEventLoop(
    socket: Duplex,
    navigator: EpisodeNavigator | undefined,
    hasExited: () => boolean
  ): Promise<number> {
    socket.on('error', (err: Error) => {
      console.warn(`[Player] IPC channel error: ${err.message}`)
    })

    const send = (command: IpcValue[]): void => {
      if (!socket.destroyed) socket.write(encodeCommand(command))
    }

    const reader = createInterface({ input: socket, crlfDelay: Infinity })
    const lines = reader[Symbol.asyncIterator]()
    const nextLine = (): Promise<LoopEvent> =>
      lines.next().then(
        (result): LoopEvent =>
          result.done ? { kind: 'closed' } : { kind: 'line', line: result.value },
        (): LoopEvent => ({ kind: 'closed' })
      )

    for (const command of keybindCommands()) send(command)
    send(observePositionCommand())

    let maxPercent = 0
    let pending = nextLine()

    try {
      for (;;) {
        let timer: NodeJS.Timeout | undefined
        const tick = new Promise<LoopEvent>((resolve) => {
          timer = setTimeout(() => resolve({ kind: 'tick' }), this.pollIntervalMs)
        })
        const event = await Promise.race([pending, tick])
        clearTimeout(timer)

        if (event.kind === 'tick') {
          if (hasExited()) break
          continue
        }
        if (event.kind === 'closed') break

        pending = nextLine()
        const message = parsePlayerMessage(event.line)

        if (message.kind === 'position') {
          if (message.percent > maxPercent) maxPercent = message.percent
        } else if (message.kind === 'navigate' && navigator) {
          if (await this.navigate(message.action, navigator, send)) {
            maxPercent = 0
          }
        }
      }
    } finally {
      reader.close()
      socket.destroy()
    }

    return maxPercent
  }

  /** Returns true when a new episode was loaded */
  private async navigate(
    action: NavigationAction,
    navigator: EpisodeNavigator,
    send: (command: IpcValue[]) => void
  ): Promise<boolean> {
    console.log(`[Player] Fetching ${action} episode...`)
    send(showTextCommand(`Fetching ${action} episode...`))

    let next: PlaybackRequest | null
    try {
      next = await navigator.resolve(action)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      console.error(`[Player] Error fetching ${action} episode: ${message}`)
      send(showTextCommand(`Error: ${message}`))
      return false
    }

    if (!next) {
      console.log(`[Player] No ${action} episode found`)
      send(showTextCommand(`No ${action} episode found`))
      return false
    }

    // Global options set for the previous episode would otherwise carry over
    send(setHeadersCommand(next.headers ?? []))
    send(setStartCommand(next.startTime))
    send(setSubtitlesCommand(next.subtitles ?? []))
    send(loadFileCommand(next.url))
    send(setTitleCommand(next.title))
    console.log(`[Player] Loaded ${next.title ?? next.url}`)
    return true
  }
}
