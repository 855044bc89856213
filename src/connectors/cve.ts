const CVE_PATTERN = /CVE-\d{4}-\d{4,}/gi;

/**
 * Extract CVE identifiers from free text: upper-cased, de-duplicated,
 * in order of first appearance.
 */
export function extractCveIds(text: string | null | undefined): string[] {
  if (!text) return [];
  const seen = new Set<string>();
  for (const match of text.matchAll(CVE_PATTERN)) {
    seen.add(match[0].toUpperCase());
  }
  return [...seen];
}
