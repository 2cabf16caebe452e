/**
 * Mirror Advisor
 *
 * Suggests alternate URLs for failed endpoints hosted on domains with
 * known mirrors.
 */

/**
 * Ordered domain substring -> replacement pairs. First match wins.
 */
export type MirrorTable = ReadonlyArray<readonly [domain: string, replacement: string]>;

export const DEFAULT_MIRROR_TABLE: MirrorTable = [
  ['iptv-org.github.io', 'raw.githubusercontent.com/iptv-org'],
  ['epg.pw', 'epgshare01.online'],
];

/**
 * Suggest a mirror for a URL, or null when no known domain matches
 */
export function suggestMirror(url: string, table: MirrorTable): string | null {
  for (const [domain, replacement] of table) {
    if (domain && url.includes(domain)) {
      return url.split(domain).join(replacement);
    }
  }
  return null;
}

/**
 * Suggest a mirror and register it in the suggestions side-table.
 * Returns the suggestion, if any.
 */
export function adviseMirror(
  url: string,
  table: MirrorTable,
  suggestions: Record<string, string>
): string | null {
  const suggested = suggestMirror(url, table);
  if (suggested !== null) {
    suggestions[url] = suggested;
  }
  return suggested;
}
