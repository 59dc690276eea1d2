import nlp from 'compromise';

/**
 * Person names found in free text, as written, without duplicates
 * (case-insensitive).
 */
export function extractPersonNames(text: string): string[] {
  if (!text.trim()) return [];

  const found: unknown = nlp(text).match('#Person+').out('array');
  if (!Array.isArray(found)) return [];

  const seen = new Set<string>();
  const names: string[] = [];
  for (const value of found) {
    if (typeof value !== 'string') continue;
    // compromise keeps trailing punctuation and possessives on the match
    const name = value.replace(/['’]s$/i, '').replace(/[^\p{L}\p{N}\s.'-]+$/u, '').trim();
    if (name.length < 2 || seen.has(name.toLowerCase())) continue;
    seen.add(name.toLowerCase());
    names.push(name);
  }
  return names;
}
