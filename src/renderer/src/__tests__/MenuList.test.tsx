import { render } from 'ink-testing-library'
import MenuList, { windowStart } from '../components/MenuList'

describe('windowStart', () => {
  it('keeps the selection near the middle', () => {
    expect(windowStart(100, 50, 15)).toBe(43)
  })

  it('clamps at both ends', () => {
    expect(windowStart(100, 2, 15)).toBe(0)
    expect(windowStart(100, 98, 15)).toBe(85)
    expect(windowStart(5, 4, 15)).toBe(0)
  })
})

describe('MenuList', () => {
  it('shows only the window around the selection', () => {
    const items = Array.from({ length: 30 }, (_, i) => `Episode ${i + 1}`)
    const { lastFrame, unmount } = render(
      <MenuList title="Episodes" items={items} selected={20} height={5} />
    )

    const frame = lastFrame() ?? ''
    expect(frame).toContain('Episodes')
    expect(frame).toContain('(21/30)')
    expect(frame).toContain('> Episode 21')
    expect(frame).toContain('Episode 19')
    expect(frame).toContain('Episode 23')
    expect(frame).not.toContain('Episode 18')
    expect(frame).not.toContain('Episode 24')
    unmount()
  })

  it('says when the list is empty', () => {
    const { lastFrame, unmount } = render(<MenuList title="Search Results" items={[]} selected={0} />)
    expect(lastFrame()).toContain('Nothing here')
    unmount()
  })
})
