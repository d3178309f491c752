// =============================================================================
// JSON with non-finite numbers
// =============================================================================
// Standard JSON has no NaN or Infinity. Requests to services carry them as the
// bare tokens a permissive encoder emits, so each service decides for itself.
// Result records carry them as strings so any JSON reader can load the file.
// =============================================================================

const MARKER = "\u0000vecdiff:nonfinite:";
const MARKER_PATTERN = /"\\u0000vecdiff:nonfinite:(NaN|Infinity|-Infinity)"/g;
const BARE_TOKEN_PATTERN = /(?<=[:,[]\s*)(-?Infinity|NaN)(?=\s*[,\]}])/g;

/**
 * Encode a request body, writing non-finite numbers as bare NaN / Infinity / -Infinity.
 */
export function encodeJson(value: unknown): string {
  const text = JSON.stringify(value, (_key, item: unknown) =>
    typeof item === "number" && !Number.isFinite(item) ? `${MARKER}${String(item)}` : item
  );
  return text.replace(MARKER_PATTERN, "$1");
}

/**
 * Encode a result record, writing non-finite numbers as the strings "NaN", "Infinity", "-Infinity".
 */
export function encodeRecord(value: unknown, space?: number): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => (typeof item === "number" && !Number.isFinite(item) ? String(item) : item),
    space
  );
}

/**
 * Parse a response body, accepting bare non-finite tokens some services emit.
 * Throws SyntaxError when the text is not JSON even after that.
 */
export function parseJsonLenient(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const quoted = text.replace(BARE_TOKEN_PATTERN, '"\\u0000vecdiff:nonfinite:$1"');
    if (quoted === text) throw error;
    return JSON.parse(quoted, (_key, item: unknown) => {
      if (typeof item === "string" && item.startsWith(MARKER)) {
        return Number(item.slice(MARKER.length));
      }
      return item;
    });
  }
}
