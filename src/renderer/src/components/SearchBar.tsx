import { Box, Text } from 'ink'

interface SearchBarProps {
  query: string
  focused: boolean
}

export default function SearchBar({ query, focused }: SearchBarProps): JSX.Element {
  return (
    <Box borderStyle="round" borderColor={focused ? 'cyan' : 'gray'} paddingX={1}>
      <Text color={focused ? 'cyan' : 'gray'}>Search: </Text>
      {query ? <Text>{query}</Text> : <Text dimColor>press / to search AniList</Text>}
      {focused && <Text color="cyan">_</Text>}
    </Box>
  )
}
