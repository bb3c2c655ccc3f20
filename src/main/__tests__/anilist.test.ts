/**
 * @fileoverview Tests for the AniList GraphQL client against a mocked fetch.
 */

import {
  AniListError,
  clearCache,
  getTrendingAnime,
  getUserProgress,
  getViewer,
  preferredTitle,
  searchAnime,
  stripHtml,
  updateUserEntry
} from '../anilist'

// ============================================
// Helpers
// ============================================

const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  })

const RAW_MEDIA = {
  id: 101,
  title: { romaji: 'Tesuto Sho', english: 'Test Show', native: null },
  description: 'A <b>test</b> show.',
  episodes: 12,
  format: 'TV',
  status: 'FINISHED',
  season: 'SPRING',
  seasonYear: 2020,
  genres: ['Action', 'Comedy'],
  averageScore: 81,
  popularity: 5000,
  studios: { nodes: [{ name: 'Studio Test' }] },
  nextAiringEpisode: null
}

const pageBody = (media: unknown[]) => ({
  data: {
    Page: {
      pageInfo: { total: media.length, currentPage: 1, hasNextPage: false },
      media
    }
  }
})

let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>

const requestBody = (call = 0): unknown => JSON.parse(String(fetchMock.mock.calls[call][1]?.body))

beforeEach(() => {
  clearCache()
  fetchMock = jest.spyOn(global, 'fetch')
  jest.spyOn(console, 'log').mockImplementation(() => undefined)
  jest.spyOn(console, 'warn').mockImplementation(() => undefined)
})

afterEach(() => {
  jest.restoreAllMocks()
})

// ============================================
// Browsing
// ============================================

describe('page queries', () => {
  it('parses media from the response', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(pageBody([RAW_MEDIA, { title: 'no id' }])))

    const page = await getTrendingAnime()

    expect(page.pageInfo).toEqual({ total: 2, currentPage: 1, hasNextPage: false })
    expect(page.media).toEqual([
      {
        id: 101,
        title: { romaji: 'Tesuto Sho', english: 'Test Show', native: null },
        description: 'A <b>test</b> show.',
        episodes: 12,
        format: 'TV',
        status: 'FINISHED',
        season: 'SPRING',
        seasonYear: 2020,
        genres: ['Action', 'Comedy'],
        averageScore: 81,
        popularity: 5000,
        studios: ['Studio Test'],
        nextAiringEpisode: null
      }
    ])
  })

  it('serves repeated queries from the cache', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(pageBody([RAW_MEDIA])))

    await getTrendingAnime(1, 20)
    const second = await getTrendingAnime(1, 20)

    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(second.media[0]?.id).toBe(101)
  })

  it('sends the search variables', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(pageBody([])))

    await searchAnime('test show')

    expect(String(fetchMock.mock.calls[0][0])).toBe('https://graphql.anilist.co')
    expect(requestBody()).toEqual(
      expect.objectContaining({ variables: { search: 'test show', page: 1, perPage: 20 } })
    )
  })

  it('retries after a rate limit response', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 429, { 'Retry-After': '0' }))
      .mockResolvedValueOnce(jsonResponse(pageBody([RAW_MEDIA])))

    const page = await getTrendingAnime()

    expect(page.media).toHaveLength(1)
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(console.warn).toHaveBeenCalledWith(
      '[AniList] Rate limited (429), retrying in 1000ms (attempt 1/3)'
    )
  })

  it('throws AniListError with the first API error message', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ errors: [{ message: 'Invalid query' }] }, 400))

    const result = searchAnime('x')
    await expect(result).rejects.toBeInstanceOf(AniListError)
    await expect(result).rejects.toThrow('AniList API error: 400 Invalid query')
  })

  it('throws on GraphQL errors in a successful response', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: null, errors: [{ message: 'Bad field' }] }))

    await expect(searchAnime('x')).rejects.toThrow('AniList query error: Bad field')
  })
})

// ============================================
// Account
// ============================================

describe('account queries', () => {
  it('reads the viewer with the token', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: { Viewer: { id: 9, name: 'tester' } } }))

    await expect(getViewer('test-token')).resolves.toEqual({ id: 9, name: 'tester' })
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual(
      expect.objectContaining({ Authorization: 'Bearer test-token' })
    )
  })

  it('rejects a response without a viewer', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: { Viewer: null } }))

    await expect(getViewer('test-token')).rejects.toThrow('AniList returned no viewer')
  })

  it('returns the list progress of a media entry', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ data: { MediaList: { id: 1, progress: 5, status: 'CURRENT' } } })
    )

    await expect(getUserProgress('test-token', 101, 'tester')).resolves.toBe(5)
    expect(requestBody()).toEqual(
      expect.objectContaining({ variables: { mediaId: 101, userName: 'tester' } })
    )
  })

  it('returns null when the media is not on the list', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: null, errors: [{ message: 'Not Found.' }] }, 404))

    await expect(getUserProgress('test-token', 101, 'tester')).resolves.toBeNull()
  })

  it('saves progress and status', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ data: { SaveMediaListEntry: { id: 1, progress: 3, status: 'CURRENT' } } })
    )

    await updateUserEntry('test-token', 101, 3, 'CURRENT')

    expect(requestBody()).toEqual(
      expect.objectContaining({ variables: { mediaId: 101, progress: 3, status: 'CURRENT' } })
    )
  })
})

// ============================================
// Helpers
// ============================================

describe('helpers', () => {
  it('prefers the English title', () => {
    const anime = {
      id: 1,
      title: { romaji: 'Tesuto Sho', english: null, native: 'テスト' },
      description: null,
      episodes: null,
      format: null,
      status: null,
      season: null,
      seasonYear: null,
      genres: [],
      averageScore: null,
      popularity: null,
      studios: [],
      nextAiringEpisode: null
    }
    expect(preferredTitle(anime)).toBe('Tesuto Sho')
    expect(preferredTitle({ ...anime, title: { ...anime.title, english: 'Test Show' } })).toBe('Test Show')
    expect(preferredTitle({ ...anime, title: { romaji: null, english: null, native: null } })).toBe(
      'Unknown Title'
    )
  })

  it('strips tags and non-breaking spaces', () => {
    expect(stripHtml('<i>Hello</i>&nbsp;world<br>')).toBe('Hello world')
    expect(stripHtml(null)).toBe('')
  })
})
