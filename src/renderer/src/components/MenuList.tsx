import { Box, Text } from 'ink'

interface MenuListProps {
  title: string
  items: string[]
  selected: number
  /** Rows shown at once; the window follows the selection */
  height?: number
  active?: boolean
}

/** First visible row for a list of `length` rows with `selected` kept near the middle */
export function windowStart(length: number, selected: number, height: number): number {
  const start = selected - Math.floor(height / 2)
  return Math.max(0, Math.min(start, length - height))
}

export default function MenuList({
  title,
  items,
  selected,
  height = 15,
  active = true
}: MenuListProps): JSX.Element {
  const start = windowStart(items.length, selected, height)
  const visible = items.slice(start, start + height)

  return (
    <Box flexDirection="column" borderStyle="round" borderColor={active ? 'cyan' : 'gray'} paddingX={1}>
      <Text bold>
        {title}
        {items.length > height && <Text dimColor>{` (${selected + 1}/${items.length})`}</Text>}
      </Text>
      {visible.length === 0 && <Text dimColor>Nothing here</Text>}
      {visible.map((item, i) => {
        const isSelected = start + i === selected
        return (
          <Text key={`${start + i}-${item}`} color={isSelected ? 'cyan' : undefined} wrap="truncate">
            {isSelected ? '> ' : '  '}
            {item}
          </Text>
        )
      })}
    </Box>
  )
}
