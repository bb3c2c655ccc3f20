/**
 * @fileoverview Tests for command line parsing and the top-level error path.
 */

import { main, parseCommand } from '../index'

afterEach(() => {
  jest.restoreAllMocks()
})

describe('parseCommand', () => {
  it('defaults to the terminal UI', () => {
    expect(parseCommand([])).toEqual({ name: 'tui' })
    expect(parseCommand(['tui'])).toEqual({ name: 'tui' })
  })

  it('joins the play title and reads the episode', () => {
    expect(parseCommand(['play', 'Test', 'Show', '-e', '3'])).toEqual({
      name: 'play',
      title: 'Test Show',
      episode: 3,
      rematch: false
    })
    expect(parseCommand(['play', 'Test Show'])).toEqual({
      name: 'play',
      title: 'Test Show',
      episode: 1,
      rematch: false
    })
  })

  it('rejects play without a title or with a bad episode', () => {
    expect(() => parseCommand(['play'])).toThrow('play needs a title')
    expect(() => parseCommand(['play', 'Test', '--episode', '0'])).toThrow(
      'Episode must be a positive integer, got "0"'
    )
    expect(() => parseCommand(['play', 'Test', '-e', '1.5'])).toThrow(
      'Episode must be a positive integer, got "1.5"'
    )
  })

  it('parses auth with a token or --logout', () => {
    expect(parseCommand(['auth', 'test-token'])).toEqual({
      name: 'auth',
      token: 'test-token',
      logout: false
    })
    expect(parseCommand(['auth', '--logout'])).toEqual({ name: 'auth', token: null, logout: true })
  })

  it('passes --rematch through to play', () => {
    expect(parseCommand(['play', 'Test Show', '--rematch'])).toEqual({
      name: 'play',
      title: 'Test Show',
      episode: 1,
      rematch: true
    })
  })

  it('parses the library commands', () => {
    expect(parseCommand(['library'])).toEqual({ name: 'library', status: null })
    expect(parseCommand(['library', '-s', 'current'])).toEqual({ name: 'library', status: 'CURRENT' })
    expect(parseCommand(['status', '21', 'dropped'])).toEqual({
      name: 'status',
      anilistId: 21,
      status: 'DROPPED'
    })
    expect(parseCommand(['remove', '21'])).toEqual({ name: 'remove', anilistId: 21 })
    expect(parseCommand(['progress', '21'])).toEqual({ name: 'progress', anilistId: 21, episode: null })
    expect(parseCommand(['progress', '21', '-e', '4'])).toEqual({
      name: 'progress',
      anilistId: 21,
      episode: 4
    })
  })

  it('rejects bad library arguments', () => {
    expect(() => parseCommand(['status', '21'])).toThrow('status needs an AniList ID and a status')
    expect(() => parseCommand(['status', '21', 'watching'])).toThrow('Unknown status "watching"')
    expect(() => parseCommand(['remove', 'abc'])).toThrow('Expected an AniList ID, got "abc"')
    expect(() => parseCommand(['remove'])).toThrow('Expected an AniList ID, got ""')
  })

  it('parses sync and help', () => {
    expect(parseCommand(['sync'])).toEqual({ name: 'sync' })
    expect(parseCommand(['play', '-h'])).toEqual({ name: 'help' })
  })

  it('rejects unknown commands and options', () => {
    expect(() => parseCommand(['watch'])).toThrow('Unknown command "watch"')
    expect(() => parseCommand(['--verbose'])).toThrow()
  })
})

describe('main', () => {
  it('prints usage for --help and exits 0', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)

    await expect(main(['--help'])).resolves.toBe(0)
    expect(log).toHaveBeenCalledWith(expect.stringContaining('Usage: animpv [command] [options]'))
  })

  it('prints the error and exits 1', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined)

    await expect(main(['watch'])).resolves.toBe(1)
    expect(error).toHaveBeenCalledWith(expect.stringContaining('animpv: Unknown command "watch"'))
  })
})
