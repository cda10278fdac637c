/**
 * Reduce HTML to the plain text the text renderer draws.
 *
 * Tags are removed with a single non-nested pass; no entity decoding and no
 * block-level line breaks. A `<` that is never closed swallows the rest of
 * the input.
 */
export function htmlToText(raw: string): string {
  return raw
    .replace(/<[^>]*>/g, "")
    .replace(/<[\s\S]*$/, "")
    .trim();
}
