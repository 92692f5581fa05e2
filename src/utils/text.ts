/**
 * Cut `text` to at most `max` UTF-16 units without splitting a surrogate
 * pair. When `ellipsis` is set and the text was cut, "..." is appended (so
 * the result may be `max + 3` long).
 */
export function truncate(text: string, max: number, ellipsis = false): string {
  if (text.length <= max) return text;
  let end = max;
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) end--;
  const cut = text.slice(0, end);
  return ellipsis ? `${cut}...` : cut;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
