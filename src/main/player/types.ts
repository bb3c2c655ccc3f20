// ─── Player Types ─────────────────────────────────────────────

export interface PlaybackRequest {
  url: string
  title?: string
  /** Start offset passed to `--start` (seconds or mpv time syntax) */
  startTime?: string
  /** Sent with every HTTP request the player makes for this stream */
  headers?: [name: string, value: string][]
  subtitles?: string[]
}

export type NavigationAction = 'next' | 'previous'

/**
 * Supplied by the caller and invoked when the user asks the running player
 * for another episode. Resolves to `null` when there is no such episode;
 * rejects on transport failures.
 */
export interface EpisodeNavigator {
  resolve(action: NavigationAction): Promise<PlaybackRequest | null>
}

export interface Player {
  /** Plays until the player exits and resolves with the max watched percentage */
  play(request: PlaybackRequest, navigator?: EpisodeNavigator): Promise<number>
}

export class ProcessSpawnError extends Error {
  constructor(
    readonly binary: string,
    cause: unknown
  ) {
    super(
      `Failed to launch ${binary}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'ProcessSpawnError'
  }
}
