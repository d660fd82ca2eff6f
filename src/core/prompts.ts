export function buildSelectionPrompt(userMessage: string, candidates: string[]): string {
  const numbered = candidates
    .map((text, i) => `Joke ${i + 1}: ${text}`)
    .join('\n\n');

  return `You are a helpful assistant that recommends jokes based on user requests.

User request: ${userMessage}

Here are some relevant jokes from the collection:
${numbered}

Based on the user's request, select the joke number(s) that best match what they're asking for.
Return ONLY the joke number(s) separated by commas (e.g., "1" or "1,3,5").
If none match well, return "none".`;
}

export function buildTopicPrompt(userMessage: string): string {
  return `Analyze this question: "${userMessage}"

The user is asking about the count of jokes in a specific category or topic.
Based on the question, what category or topic are they asking about?
Return ONLY the category/topic name (e.g., "physics", "programming", "christmas", "misc").
If unclear, return "unknown".`;
}

/**
 * Read the model's pick. Numbers are 1-based in the prompt; the result holds
 * 0-based indices within range, in the order given, without repeats.
 */
export function parseSelection(text: string, candidateCount: number): number[] | 'none' {
  const answer = text.trim();
  if (answer.toLowerCase() === 'none') {
    return 'none';
  }

  const indices: number[] = [];
  for (const part of answer.split(',')) {
    const token = part.trim();
    if (!/^\d+$/.test(token)) {
      continue;
    }
    const index = Number(token) - 1;
    if (index >= 0 && index < candidateCount && !indices.includes(index)) {
      indices.push(index);
    }
  }
  return indices;
}

export function normalizeTopic(text: string): string {
  return text.trim().toLowerCase().replace(/^["']+|["'.]+$/g, '');
}

/**
 * Keyword fallback when the model cannot name the topic: the word after
 * "how many", or "unknown".
 */
export function extractTopicFallback(userMessage: string): string {
  const match = /how many (\w+)/.exec(userMessage.toLowerCase());
  return match ? match[1] : 'unknown';
}

export const NSFW_KEYWORDS = ['nsfw', 'inappropriate', 'explicit', 'adult', 'dirty', 'sexual'];

export function isNsfwRequest(userMessage: string): boolean {
  const lower = userMessage.toLowerCase();
  return NSFW_KEYWORDS.some(keyword => lower.includes(keyword));
}

export function isCountingQuestion(userMessage: string): boolean {
  const lower = userMessage.toLowerCase();
  return lower.includes('how many') || lower.includes('count');
}

const EXISTENCE_PHRASES = ['are there', 'do you have', 'is there', 'any'];

export function isExistenceQuestion(userMessage: string): boolean {
  const lower = userMessage.toLowerCase();
  return userMessage.trim().endsWith('?') && EXISTENCE_PHRASES.some(phrase => lower.includes(phrase));
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
