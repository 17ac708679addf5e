/**
 * Context snippets around case-insensitive occurrences of a term.
 * Snippets do not overlap; cut edges are marked with `...`.
 */
export function extractHighlights(content: string, term: string | undefined, radius = 40, max = 3): string[] {
  if (!term || !content) return [];

  const haystack = content.toLowerCase();
  const needle = term.toLowerCase();
  const snippets: string[] = [];

  let at = haystack.indexOf(needle);
  while (at !== -1 && snippets.length < max) {
    const start = Math.max(0, at - radius);
    const end = Math.min(content.length, at + needle.length + radius);
    snippets.push(`${start > 0 ? '...' : ''}${content.slice(start, end)}${end < content.length ? '...' : ''}`);
    at = haystack.indexOf(needle, end);
  }
  return snippets;
}
