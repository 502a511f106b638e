/**
 * Location Extraction
 *
 * Two strategies, first hit wins:
 *   1. Text following a marker ("Location:", "Venue:", "Where:", "Address:", "at ")
 *      up to the next sentence break or newline.
 *   2. A US street address ("123 Main Street, Erie, PA").
 */

const LOCATION_MARKERS: readonly RegExp[] = [
  /\bat\s/i,
  /\blocation:/i,
  /\bvenue:/i,
  /\bwhere:/i,
  /\baddress:/i,
];

const UP_TO_SENTENCE_END = /^([^.!?\n]+)/;

const STREET_ADDRESS =
  /\d+\s+[A-Za-z\s]+(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr)\b(?:[,\s]+[A-Za-z\s]+(?:,\s*[A-Z]{2})?)?/;

export function extractLocation(text: string | null | undefined): string | null {
  if (!text) return null;

  for (const marker of LOCATION_MARKERS) {
    const hit = marker.exec(text);
    if (!hit) continue;

    const rest = text.slice(hit.index + hit[0].length).trim();
    const chunk = UP_TO_SENTENCE_END.exec(rest);
    if (chunk) {
      const location = chunk[1].trim();
      if (location) return location;
    }
  }

  const address = STREET_ADDRESS.exec(text);
  return address ? address[0].trim() : null;
}
