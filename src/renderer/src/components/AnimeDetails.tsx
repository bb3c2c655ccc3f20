import { Box, Text } from 'ink'
import { preferredTitle, stripHtml } from '../../../main/anilist'
import type { AniListAnime } from '../../../types'

const MAX_DESCRIPTION = 300

export default function AnimeDetails({ anime }: { anime: AniListAnime }): JSX.Element {
  const description = stripHtml(anime.description)
  const meta = [
    anime.format,
    anime.episodes !== null ? `${anime.episodes} episodes` : null,
    anime.season && anime.seasonYear ? `${anime.season} ${anime.seasonYear}` : null,
    anime.averageScore !== null ? `${anime.averageScore}%` : null
  ].filter((m): m is string => !!m)

  return (
    <Box flexDirection="column" paddingX={1} width={60}>
      <Text bold color="cyan">
        {preferredTitle(anime)}
      </Text>
      {anime.title.romaji && anime.title.romaji !== preferredTitle(anime) && (
        <Text dimColor>{anime.title.romaji}</Text>
      )}
      {meta.length > 0 && <Text>{meta.join(' · ')}</Text>}
      {anime.genres.length > 0 && <Text color="gray">{anime.genres.join(', ')}</Text>}
      {anime.nextAiringEpisode && (
        <Text color="green">
          Episode {anime.nextAiringEpisode.episode} airs{' '}
          {new Date(anime.nextAiringEpisode.airingAt * 1000).toLocaleDateString()}
        </Text>
      )}
      {description && (
        <Box marginTop={1}>
          <Text>
            {description.length > MAX_DESCRIPTION
              ? `${description.slice(0, MAX_DESCRIPTION)}...`
              : description}
          </Text>
        </Box>
      )}
    </Box>
  )
}
