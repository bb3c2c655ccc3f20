/**
 * @fileoverview Tests for EpisodeCursor and the episode navigator.
 */

import { EpisodeCursor, createEpisodeNavigator } from '../navigator'
import type { PlaybackRequest } from '../player/types'

const requestFor = (episode: number): PlaybackRequest => ({
  url: `http://example/ep${episode}.m3u8`,
  title: `Show - Episode ${episode}`
})

describe('EpisodeCursor', () => {
  it('rejects starting positions that are not positive integers', () => {
    expect(() => new EpisodeCursor(0)).toThrow(RangeError)
    expect(() => new EpisodeCursor(-2)).toThrow(RangeError)
    expect(() => new EpisodeCursor(1.5)).toThrow('Episode must be a positive integer, got 1.5')
  })

  it('does not retreat below episode 1', () => {
    const cursor = new EpisodeCursor(1)
    expect(cursor.retreat()).toBeNull()
    expect(cursor.current).toBe(1)
  })

  it('runs exclusive tasks one at a time in call order', async () => {
    const cursor = new EpisodeCursor(1)
    const order: string[] = []
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const first = cursor.runExclusive(async () => {
      order.push('first:start')
      await gate
      order.push('first:end')
    })
    const second = cursor.runExclusive(async () => {
      order.push('second')
    })

    await Promise.resolve()
    release()
    await Promise.all([first, second])

    expect(order).toEqual(['first:start', 'first:end', 'second'])
  })

  it('keeps running tasks after one fails', async () => {
    const cursor = new EpisodeCursor(3)
    await expect(
      cursor.runExclusive(async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')
    await expect(cursor.runExclusive(async () => cursor.current)).resolves.toBe(3)
  })
})

describe('createEpisodeNavigator', () => {
  it('returns null for previous at episode 1 without resolving anything', async () => {
    const resolveEpisode = jest.fn(async (episode: number) => requestFor(episode))
    const cursor = new EpisodeCursor(1)
    const navigator = createEpisodeNavigator(cursor, resolveEpisode)

    await expect(navigator.resolve('previous')).resolves.toBeNull()
    expect(cursor.current).toBe(1)
    expect(resolveEpisode).not.toHaveBeenCalled()
  })

  it('advances by exactly one per next action that loads an episode', async () => {
    const resolveEpisode = jest.fn(async (episode: number) => requestFor(episode))
    const cursor = new EpisodeCursor(4)
    const navigator = createEpisodeNavigator(cursor, resolveEpisode)

    const seen: number[] = []
    for (let i = 0; i < 5; i++) {
      await navigator.resolve('next')
      seen.push(cursor.current)
    }

    expect(seen).toEqual([5, 6, 7, 8, 9])
    expect(resolveEpisode.mock.calls.map(([episode]) => episode)).toEqual([5, 6, 7, 8, 9])
  })

  it('serializes concurrent next actions', async () => {
    const resolveEpisode = jest.fn(async (episode: number) => requestFor(episode))
    const cursor = new EpisodeCursor(1)
    const navigator = createEpisodeNavigator(cursor, resolveEpisode)

    const results = await Promise.all([
      navigator.resolve('next'),
      navigator.resolve('next'),
      navigator.resolve('next')
    ])

    expect(results.map((r) => r?.url)).toEqual([
      'http://example/ep2.m3u8',
      'http://example/ep3.m3u8',
      'http://example/ep4.m3u8'
    ])
    expect(cursor.current).toBe(4)
  })

  it('moves back for previous', async () => {
    const cursor = new EpisodeCursor(3)
    const navigator = createEpisodeNavigator(cursor, async (episode) => requestFor(episode))

    await expect(navigator.resolve('previous')).resolves.toEqual(requestFor(2))
    expect(cursor.current).toBe(2)
  })

  // Unlike a plain counter, a Next that loads nothing leaves the cursor on the
  // episode still playing, so progress is saved against what was watched.
  it('stays on the playing episode instead of advancing when the next one does not exist', async () => {
    const cursor = new EpisodeCursor(12)
    const navigator = createEpisodeNavigator(cursor, async () => null)

    await expect(navigator.resolve('next')).resolves.toBeNull()
    expect(cursor.current).toBe(12)
  })

  it('stays on the playing episode and rethrows when resolution fails', async () => {
    const cursor = new EpisodeCursor(7)
    const navigator = createEpisodeNavigator(cursor, async () => {
      throw new Error('network down')
    })

    await expect(navigator.resolve('previous')).rejects.toThrow('network down')
    expect(cursor.current).toBe(7)
  })

  it('steps back from the playing episode after a next that found nothing', async () => {
    const resolveEpisode = jest.fn(async (episode: number) =>
      episode === 6 ? null : requestFor(episode)
    )
    const cursor = new EpisodeCursor(5)
    const navigator = createEpisodeNavigator(cursor, resolveEpisode)

    await expect(navigator.resolve('next')).resolves.toBeNull()
    await expect(navigator.resolve('previous')).resolves.toEqual(requestFor(4))
    expect(resolveEpisode.mock.calls.map(([episode]) => episode)).toEqual([6, 4])
  })
})
