const MAX_SUMMARY_LENGTH = 280;
const ELLIPSIS = '…';

// Only these five are decoded; anything else stays as written.
const ENTITIES: ReadonlyArray<[string, string]> = [
  ['&amp;', '&'],
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&#39;', "'"],
  ['&quot;', '"'],
];

/**
 * Turns a feed summary into plain text: drops tags, decodes the basic
 * entities, collapses whitespace and caps the length at 280 characters
 * plus an ellipsis.
 *
 * Tag stripping is a plain regex, so nested or broken markup may leave
 * fragments behind.
 */
export function normalizeSummary(raw: string): string {
  let clean = raw.replace(/<[^>]+>/g, '');
  for (const [entity, char] of ENTITIES) {
    clean = clean.split(entity).join(char);
  }
  clean = clean.replace(/\s+/g, ' ').trim();

  return clean.length > MAX_SUMMARY_LENGTH
    ? clean.slice(0, MAX_SUMMARY_LENGTH) + ELLIPSIS
    : clean;
}
