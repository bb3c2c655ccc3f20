import type { EpisodeNavigator, NavigationAction, PlaybackRequest } from './player/types'

/**
 * 1-based index of the episode loaded in the player. Shared between the
 * caller that creates it and the navigator that moves it; `runExclusive`
 * serializes access across awaits.
 */
export class EpisodeCursor {
  private episode: number
  private tail: Promise<void> = Promise.resolve()

  constructor(start: number) {
    if (!Number.isInteger(start) || start < 1) {
      throw new RangeError(`Episode must be a positive integer, got ${start}`)
    }
    this.episode = start
  }

  get current(): number {
    return this.episode
  }

  advance(): number {
    this.episode += 1
    return this.episode
  }

  /** `null` at episode 1, leaving the cursor where it is */
  retreat(): number | null {
    if (this.episode <= 1) return null
    this.episode -= 1
    return this.episode
  }

  set(episode: number): void {
    this.episode = episode
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task)
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}

export type EpisodeResolver = (episode: number) => Promise<PlaybackRequest | null>

/**
 * Moves the cursor for each action and resolves the episode it lands on.
 * When nothing could be loaded the cursor goes back to the episode that is
 * still playing.
 */
export function createEpisodeNavigator(
  cursor: EpisodeCursor,
  resolveEpisode: EpisodeResolver
): EpisodeNavigator {
  return {
    resolve: (action: NavigationAction) =>
      cursor.runExclusive(async () => {
        const loaded = cursor.current
        const target = action === 'next' ? cursor.advance() : cursor.retreat()
        if (target === null) return null

        try {
          const request = await resolveEpisode(target)
          if (!request) cursor.set(loaded)
          return request
        } catch (err) {
          cursor.set(loaded)
          throw err
        }
      })
  }
}
