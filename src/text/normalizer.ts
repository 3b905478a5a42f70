/**
 * Whitespace cleanup applied to every decoded novel before it is chunked.
 *
 * Only ASCII space and tab count as horizontal whitespace while collapsing,
 * so ideographic spaces (U+3000) inside the text survive untouched. The final
 * trim removes any Unicode whitespace at either end.
 * The steps run in a fixed order; reordering them changes the output.
 */
export function normalize(text: string): string {
  return (
    text
      .replace(/\r\n?/g, "\n")
      .replace(/\n{3,}/g, "\n\n")
      .replace(/^[ \t]+/gm, "")
      .replace(/[ \t]+$/gm, "")
      .replace(/[ \t]+/g, " ")
      .trim()
  );
}
