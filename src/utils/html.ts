/**
 * Escapes user-provided text for messages sent in HTML parse mode
 */
export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Shortens text to `maxLength` code points, marking the cut with an ellipsis.
 * Never splits a surrogate pair.
 */
export function truncate(input: string, maxLength: number): string {
  const codePoints = Array.from(input);
  return codePoints.length > maxLength ? `${codePoints.slice(0, maxLength).join('')}...` : input;
}
