import { Box, Text } from 'ink'
import type { StreamOptions } from '../state'

interface StatusBarProps {
  status: string | null
  loading: boolean
  options: StreamOptions
  username: string | null
}

export default function StatusBar({ status, loading, options, username }: StatusBarProps): JSX.Element {
  return (
    <Box justifyContent="space-between" paddingX={1}>
      <Text color={loading ? 'yellow' : undefined}>{status ?? 'j/k move  J/K jump  enter select  esc back  q quit'}</Text>
      <Text dimColor>
        {options.quality}p {options.translationType}
        {username ? ` | ${username}` : ''}
      </Text>
    </Box>
  )
}
