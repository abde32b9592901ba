/**
 * Shared parsing helpers for slash-command input.
 */

const WHITESPACE = /\s+/;

export function splitTokens(input: string): string[] {
  const normalized = input.trim();
  return normalized ? normalized.split(WHITESPACE).filter(Boolean) : [];
}

/** First token lowercased, or ''. */
export function firstToken(input: string): string {
  return splitTokens(input)[0]?.toLowerCase() ?? '';
}

export function restTokens(input: string): string[] {
  return splitTokens(input).slice(1);
}

