/**
 * Generate a unique turn ID
 */
export function generateId(prefix: string = 'turn'): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Get current timestamp
 */
export function now(): number {
  return Date.now();
}

/**
 * Sort turns by insertion sequence (oldest first)
 */
export function sortChronologically<T extends { sequence: number }>(turns: readonly T[]): T[] {
  return [...turns].sort((a, b) => a.sequence - b.sequence);
}

/**
 * Sum the token counts of a list of turns
 */
export function sumTokens(turns: readonly { tokenCount: number }[]): number {
  return turns.reduce((total, turn) => total + turn.tokenCount, 0);
}

/**
 * Utilization of a budget as a percentage, 0 when the budget is empty
 */
export function utilization(used: number, available: number): number {
  return available > 0 ? (used / available) * 100 : 0;
}

/**
 * Shorten text for previews and log lines
 */
export function preview(text: string, maxLength: number = 50): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
