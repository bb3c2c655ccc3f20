import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import { DEFAULT_CONNECT_ATTEMPTS, DEFAULT_CONNECT_RETRY_MS, DEFAULT_POLL_INTERVAL_MS } from './player/mpv'
import { DEFAULT_SOURCE_PRIORITY, type StreamQuality, type TranslationType } from './providers'
import { asNumber, asString, asStringArray, field } from './json'

// ─── Config Types ─────────────────────────────────────────────

export interface AppConfig {
  general: {
    provider: 'allanime'
  }
  stream: {
    /** Player binary looked up on PATH */
    player: string
    quality: StreamQuality
    translationType: TranslationType
    /** Percentage (0-100) at which an episode counts as watched */
    episodeCompleteAt: number
    sourcePriority: string[]
  }
  player: {
    connectAttempts: number
    connectRetryMs: number
    pollIntervalMs: number
  }
}

export interface AuthConfig {
  anilistToken: string | null
  username: string | null
}

export const QUALITIES: readonly StreamQuality[] = ['1080', '720', '480']
export const TRANSLATION_TYPES: readonly TranslationType[] = ['sub', 'dub']

export function defaultConfig(): AppConfig {
  return {
    general: { provider: 'allanime' },
    stream: {
      player: 'mpv',
      quality: '1080',
      translationType: 'sub',
      episodeCompleteAt: 85,
      sourcePriority: [...DEFAULT_SOURCE_PRIORITY]
    },
    player: {
      connectAttempts: DEFAULT_CONNECT_ATTEMPTS,
      connectRetryMs: DEFAULT_CONNECT_RETRY_MS,
      pollIntervalMs: DEFAULT_POLL_INTERVAL_MS
    }
  }
}

// ─── Locations ────────────────────────────────────────────────

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.ANIMPV_CONFIG_DIR) return env.ANIMPV_CONFIG_DIR
  if (process.platform === 'win32' && env.APPDATA) return join(env.APPDATA, 'animpv')
  return join(env.XDG_CONFIG_HOME || join(homedir(), '.config'), 'animpv')
}

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.ANIMPV_DATA_DIR || resolveConfigDir(env)
}

// ─── Parsing ──────────────────────────────────────────────────
// Each field falls back to its default on its own, so one bad value
// doesn't throw away the rest of the file.

function oneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback
}

function positiveInt(value: unknown, fallback: number): number {
  const n = asNumber(value)
  return n !== null && Number.isInteger(n) && n > 0 ? n : fallback
}

export function mergeConfig(raw: unknown): AppConfig {
  const defaults = defaultConfig()
  const completeAt = asNumber(field(raw, 'stream', 'episodeCompleteAt'))
  const priority = asStringArray(field(raw, 'stream', 'sourcePriority'))

  return {
    general: { provider: 'allanime' },
    stream: {
      player: asString(field(raw, 'stream', 'player')) || defaults.stream.player,
      quality: oneOf(field(raw, 'stream', 'quality'), QUALITIES, defaults.stream.quality),
      translationType: oneOf(
        field(raw, 'stream', 'translationType'),
        TRANSLATION_TYPES,
        defaults.stream.translationType
      ),
      episodeCompleteAt:
        completeAt !== null && completeAt >= 0 && completeAt <= 100
          ? completeAt
          : defaults.stream.episodeCompleteAt,
      sourcePriority: priority.length > 0 ? priority : defaults.stream.sourcePriority
    },
    player: {
      connectAttempts: positiveInt(field(raw, 'player', 'connectAttempts'), defaults.player.connectAttempts),
      connectRetryMs: positiveInt(field(raw, 'player', 'connectRetryMs'), defaults.player.connectRetryMs),
      pollIntervalMs: positiveInt(field(raw, 'player', 'pollIntervalMs'), defaults.player.pollIntervalMs)
    }
  }
}

export function mergeAuth(raw: unknown): AuthConfig {
  return {
    anilistToken: asString(field(raw, 'anilistToken')),
    username: asString(field(raw, 'username'))
  }
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    console.warn(`[Config] Could not read ${path}, using defaults: ${(err as Error).message}`)
    return null
  }
}

// ─── Manager ──────────────────────────────────────────────────

export class ConfigManager {
  readonly configPath: string
  readonly authPath: string

  private constructor(
    readonly configDir: string,
    public config: AppConfig,
    public auth: AuthConfig
  ) {
    this.configPath = join(configDir, 'config.json')
    this.authPath = join(configDir, 'auth.json')
  }

  /** Loads both files, writing a default config.json on first run */
  static load(configDir = resolveConfigDir()): ConfigManager {
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true })
    }

    const configPath = join(configDir, 'config.json')
    const authPath = join(configDir, 'auth.json')

    const config = existsSync(configPath) ? mergeConfig(readJson(configPath)) : defaultConfig()
    const auth = existsSync(authPath)
      ? mergeAuth(readJson(authPath))
      : { anilistToken: null, username: null }

    const manager = new ConfigManager(configDir, config, auth)
    if (!existsSync(configPath)) manager.saveConfig()
    return manager
  }

  get isAuthenticated(): boolean {
    return !!this.auth.anilistToken && !!this.auth.username
  }

  saveConfig(): void {
    writeFileSync(this.configPath, `${JSON.stringify(this.config, null, 2)}\n`)
  }

  saveAuth(): void {
    writeFileSync(this.authPath, `${JSON.stringify(this.auth, null, 2)}\n`, { mode: 0o600 })
  }

  logout(): void {
    this.auth = { anilistToken: null, username: null }
    this.saveAuth()
  }

  /** Checks the token against AniList and stores it with the account name */
  async verifyAndSaveToken(
    token: string,
    getViewer: (token: string) => Promise<{ name: string }>
  ): Promise<string> {
    const trimmed = token.trim()
    if (!trimmed) throw new Error('Token is empty')
    const viewer = await getViewer(trimmed)
    this.auth = { anilistToken: trimmed, username: viewer.name }
    this.saveAuth()
    console.log(`[Config] Authenticated as ${viewer.name}`)
    return viewer.name
  }
}
