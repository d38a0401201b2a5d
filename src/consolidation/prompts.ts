import type { Exchange } from '../memory/types.js'

export function formatTranscript(exchanges: Exchange[]): string {
  return exchanges
    .map(ex => `${ex.role === 'user' ? 'User' : 'Assistant'}: ${ex.content}`)
    .join('\n')
}

export function buildCondensationPrompt(exchanges: Exchange[], priorSummary: string | null): string {
  const prior = priorSummary
    ? `\nWhat is already known about this user from earlier sessions:\n${priorSummary}\n`
    : ''

  return `Write the long-term memory for this user from the conversation below.
Keep anything they shared about themselves: work, location, family and friends, goals, recurring struggles, and what advice helped or did not.
${priorSummary ? 'Fold the earlier background in. Keep facts that still hold, update facts the conversation changed, and drop nothing important.\n' : ''}
Write in the third person and in the past tense for events. Plain prose, no headings, no bullet points, at most 200 words.
${prior}
Conversation:
${formatTranscript(exchanges)}

Return only the summary text.`
}
