/**
 * Whole-document check: true only when `text` parses as strict JSON.
 *
 * Truncated and malformed input are not told apart; both are `false`.
 * Use `JsonCompletenessTracker` when per-path detail is needed.
 */
export function isJsonComplete(text: string): boolean {
  if (!text.trim()) {
    return false;
  }

  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}
