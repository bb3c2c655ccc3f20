import { Box, Text } from 'ink'

export default function StreamLog({ lines }: { lines: string[] }): JSX.Element {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="magenta" paddingX={1}>
      <Text bold>Stream</Text>
      {lines.map((line, i) => (
        <Text key={i} wrap="truncate">
          {line}
        </Text>
      ))}
      <Text dimColor>Shift+N / Shift+P in mpv for next / previous episode</Text>
    </Box>
  )
}
