/**
 * Tool result shaping for the transcript.
 */

const CHARS_PER_TOKEN = 4;

/**
 * Fit a tool result into `maxTokens` (about 4 chars per token) by keeping
 * the first 60% and the last 20% of the budget. 0 disables truncation.
 */
export function truncateToolResult(content: string, maxTokens: number): string {
  if (maxTokens <= 0) {
    return content;
  }
  const maxChars = maxTokens * CHARS_PER_TOKEN;
  if (content.length <= maxChars) {
    return content;
  }

  const headChars = Math.floor((maxChars * 6) / 10);
  const tailChars = Math.floor((maxChars * 2) / 10);
  const head = content.slice(0, headChars);
  const tail = tailChars > 0 ? content.slice(content.length - tailChars) : "";
  const omittedChars = content.length - headChars - tailChars;
  const omittedTokens = Math.floor(omittedChars / CHARS_PER_TOKEN);

  return `${head}\n\n[... truncated ${omittedTokens} tokens (${omittedChars} chars) to fit context window ...]\n\n${tail}`;
}

export function deniedResult(reason: string): string {
  return `DENIED: ${reason}`;
}
