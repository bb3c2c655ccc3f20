/**
 * @fileoverview Tests for the mpv JSON IPC codec.
 */

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
  showTextCommand
} from '../ipc'

describe('parsePlayerMessage', () => {
  it('maps client messages to navigation actions', () => {
    expect(parsePlayerMessage('{"event":"client-message","args":["next-episode"]}')).toEqual({
      kind: 'navigate',
      action: 'next'
    })
    expect(parsePlayerMessage('{"event":"client-message","args":["previous-episode"]}')).toEqual({
      kind: 'navigate',
      action: 'previous'
    })
  })

  it('reads numeric position changes', () => {
    expect(
      parsePlayerMessage('{"event":"property-change","id":1,"name":"percent-pos","data":45.5}')
    ).toEqual({ kind: 'position', percent: 45.5 })
  })

  it('ignores position changes without a number', () => {
    expect(
      parsePlayerMessage('{"event":"property-change","id":1,"name":"percent-pos","data":null}')
    ).toEqual({ kind: 'ignored' })
  })

  it('ignores other properties, unknown signals and command replies', () => {
    expect(
      parsePlayerMessage('{"event":"property-change","name":"time-pos","data":12}').kind
    ).toBe('ignored')
    expect(parsePlayerMessage('{"event":"client-message","args":["other"]}').kind).toBe('ignored')
    expect(parsePlayerMessage('{"event":"client-message","args":[]}').kind).toBe('ignored')
    expect(parsePlayerMessage('{"data":null,"request_id":0,"error":"success"}').kind).toBe('ignored')
  })

  it('ignores malformed lines', () => {
    expect(parsePlayerMessage('not json').kind).toBe('ignored')
    expect(parsePlayerMessage('[1,2]').kind).toBe('ignored')
    expect(parsePlayerMessage('').kind).toBe('ignored')
  })
})

describe('command builders', () => {
  it('encodes a command as one JSON line', () => {
    expect(encodeCommand(['loadfile', 'http://example/ep2.m3u8', 'replace'])).toBe(
      '{"command":["loadfile","http://example/ep2.m3u8","replace"]}\n'
    )
  })

  it('binds both keys for each direction', () => {
    expect(keybindCommands()).toEqual([
      ['keybind', 'Shift+N', 'script-message next-episode'],
      ['keybind', '>', 'script-message next-episode'],
      ['keybind', 'Shift+P', 'script-message previous-episode'],
      ['keybind', '<', 'script-message previous-episode']
    ])
  })

  it('builds the property and overlay commands', () => {
    expect(observePositionCommand()).toEqual(['observe_property', 1, 'percent-pos'])
    expect(loadFileCommand('http://example/ep1.m3u8')).toEqual([
      'loadfile',
      'http://example/ep1.m3u8',
      'replace'
    ])
    expect(setTitleCommand('Show - Episode 2')).toEqual(['set_property', 'title', 'Show - Episode 2'])
    expect(showTextCommand('No next episode found')).toEqual([
      'show-text',
      'No next episode found',
      3000
    ])
  })

  it('formats headers as mpv header fields', () => {
    expect(
      setHeadersCommand([
        ['Referer', 'https://example.test/'],
        ['User-Agent', 'test-agent']
      ])
    ).toEqual([
      'set_property',
      'http-header-fields',
      ['Referer: https://example.test/', 'User-Agent: test-agent']
    ])
  })

  it('builds resets for options that belong to a single file', () => {
    expect(setHeadersCommand([])).toEqual(['set_property', 'http-header-fields', []])
    expect(setStartCommand()).toEqual(['set_property', 'start', 'none'])
    expect(setStartCommand('90')).toEqual(['set_property', 'start', '90'])
    expect(setSubtitlesCommand([])).toEqual(['set_property', 'sub-files', []])
    expect(setTitleCommand()).toEqual([
      'set_property',
      'title',
      '${?media-title:${media-title}}${!media-title:No file}'
    ])
  })
})
