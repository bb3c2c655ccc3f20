import { isRecord } from '../json'
import type { NavigationAction } from './types'

// ─── mpv JSON IPC ─────────────────────────────────────────────
// Newline-delimited JSON over a unix socket (named pipe on Windows).
// Outbound: { "command": [...] }. Inbound: events and command replies.

export const NEXT_EPISODE_SIGNAL = 'next-episode'
export const PREVIOUS_EPISODE_SIGNAL = 'previous-episode'

export const POSITION_PROPERTY = 'percent-pos'
const POSITION_OBSERVER_ID = 1

/** Primary key first, then the fallback */
export const NAVIGATION_KEYS: Record<NavigationAction, string[]> = {
  next: ['Shift+N', '>'],
  previous: ['Shift+P', '<']
}

const SIGNALS: Record<NavigationAction, string> = {
  next: NEXT_EPISODE_SIGNAL,
  previous: PREVIOUS_EPISODE_SIGNAL
}

export type IpcValue = string | number | boolean | string[]

export interface IpcCommand {
  command: IpcValue[]
}

export type PlayerMessage =
  | { kind: 'navigate'; action: NavigationAction }
  | { kind: 'position'; percent: number }
  | { kind: 'ignored' }

const IGNORED: PlayerMessage = { kind: 'ignored' }

function signalToAction(signal: unknown): NavigationAction | null {
  if (signal === NEXT_EPISODE_SIGNAL) return 'next'
  if (signal === PREVIOUS_EPISODE_SIGNAL) return 'previous'
  return null
}

/**
 * Parse one line from the socket. Anything that is not a navigation signal or
 * a numeric position change (command replies, other events, malformed JSON)
 * comes back as `ignored`.
 */
export function parsePlayerMessage(line: string): PlayerMessage {
  let value: unknown
  try {
    value = JSON.parse(line)
  } catch {
    return IGNORED
  }
  if (!isRecord(value)) return IGNORED

  if (value.event === 'client-message') {
    const args = value.args
    if (!Array.isArray(args) || args.length === 0) return IGNORED
    const action = signalToAction(args[0])
    return action ? { kind: 'navigate', action } : IGNORED
  }

  if (value.event === 'property-change' && value.name === POSITION_PROPERTY) {
    const data = value.data
    if (typeof data === 'number' && Number.isFinite(data)) {
      return { kind: 'position', percent: data }
    }
  }

  return IGNORED
}

export function encodeCommand(command: IpcValue[]): string {
  const payload: IpcCommand = { command }
  return `${JSON.stringify(payload)}\n`
}

// ─── Command builders ─────────────────────────────────────────

export function keybindCommands(): IpcValue[][] {
  const commands: IpcValue[][] = []
  for (const action of ['next', 'previous'] as const) {
    for (const key of NAVIGATION_KEYS[action]) {
      commands.push(['keybind', key, `script-message ${SIGNALS[action]}`])
    }
  }
  return commands
}

export function observePositionCommand(): IpcValue[] {
  return ['observe_property', POSITION_OBSERVER_ID, POSITION_PROPERTY]
}

export function loadFileCommand(url: string): IpcValue[] {
  return ['loadfile', url, 'replace']
}

/** mpv's own window title, used when a request carries none */
export const DEFAULT_TITLE = '${?media-title:${media-title}}${!media-title:No file}'

export function setTitleCommand(title: string = DEFAULT_TITLE): IpcValue[] {
  return ['set_property', 'title', title]
}

/** `none` plays the next file from the beginning */
export function setStartCommand(startTime: string = 'none'): IpcValue[] {
  return ['set_property', 'start', startTime]
}

export function setSubtitlesCommand(subtitles: string[]): IpcValue[] {
  return ['set_property', 'sub-files', subtitles]
}

export function setHeadersCommand(headers: [string, string][]): IpcValue[] {
  return ['set_property', 'http-header-fields', headers.map(([name, value]) => `${name}: ${value}`)]
}

export function showTextCommand(text: string, durationMs = 3000): IpcValue[] {
  return ['show-text', text, durationMs]
}
