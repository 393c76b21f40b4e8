// src/services/text.sanitizer.ts

const SCRIPT_OR_STYLE = /<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const COMMENT = /<!--[\s\S]*?-->/g;
// Quoted attribute values may contain `>`.
const TAG = /<\/?[a-z!?](?:"[^"]*"|'[^']*'|[^'">])*>/gi;
// A tag still open at the end of the text.
const UNTERMINATED_TAG = /<\/?[a-z!?][\s\S]*$/i;

const stripOnce = (text: string) =>
  text.replace(SCRIPT_OR_STYLE, "").replace(COMMENT, "").replace(TAG, "");

/**
 * Strips markup from user text and keeps the text content.
 *
 * Script and style bodies are dropped together with their tags. Stripping
 * repeats until nothing changes, so pieces left around a removed tag
 * (`<<b>script>`) cannot join into a new one. A tag that never closes is
 * dropped up to the end of the text. A `<` that does not open a tag, as in
 * `1 < 2`, is kept.
 */
export const sanitize = (raw: string): string => {
  let text = raw;
  for (;;) {
    const next = stripOnce(text);
    if (next === text) return next.replace(UNTERMINATED_TAG, "");
    text = next;
  }
};
