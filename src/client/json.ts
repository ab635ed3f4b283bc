import { ParseError } from '../errors.js';

export const DEFAULT_MAX_JSON_REPAIRS = 100;

const POSITION_PATTERN = /at position (\d+)/;
const BAD_ESCAPE_PATTERN = /Bad (escaped character|Unicode escape)/;

// Longest distance from the reported position back to the escape's backslash (\uXXXX)
const MAX_ESCAPE_OFFSET = 5;

function errorPosition(err: unknown): number | null {
  if (!(err instanceof SyntaxError)) return null;
  const match = POSITION_PATTERN.exec(err.message);
  return match?.[1] !== undefined ? Number(match[1]) : null;
}

function isBadEscape(err: unknown): boolean {
  return err instanceof SyntaxError && BAD_ESCAPE_PATTERN.test(err.message);
}

/** Index of the backslash opening the escape the parser rejected at `position`. */
function escapeStart(chars: readonly string[], position: number): number | null {
  const lowest = Math.max(0, position - MAX_ESCAPE_OFFSET);
  for (let i = position; i >= lowest; i -= 1) {
    if (chars[i] === '\\') return i;
  }
  return null;
}

/**
 * Parses JSON, blanking out characters the parser rejects.
 *
 * The Doc API occasionally emits invalid escape sequences and raw control
 * characters inside strings. On each SyntaxError that reports a position,
 * the character there is replaced with a space and parsing is retried. For a
 * bad escape sequence only its backslash is blanked, so the rest of the
 * sequence stays as literal text. For other errors, when the parser stops at
 * the same position twice the preceding character is blanked instead.
 * Repaired values are lossy.
 *
 * @param maxRepairs - repairs attempted before giving up with a ParseError.
 */
export function loadJson(payload: string | Uint8Array, maxRepairs = DEFAULT_MAX_JSON_REPAIRS): unknown {
  // Split into UTF-16 code units, which is what parser positions count
  const chars = (typeof payload === 'string' ? payload : new TextDecoder().decode(payload)).split('');
  let lastPosition: number | null = null;

  for (let repairs = 0; ; repairs += 1) {
    try {
      return JSON.parse(chars.join(''));
    } catch (err) {
      if (repairs >= maxRepairs) {
        throw new ParseError('Failed to parse JSON: max recursion depth reached', err);
      }
      const position = errorPosition(err);
      if (position === null || position >= chars.length) {
        throw new ParseError(`Failed to parse JSON: ${String(err)}`, err);
      }
      const backslash = isBadEscape(err) ? escapeStart(chars, position) : null;
      if (backslash !== null) {
        chars[backslash] = ' ';
      } else {
        chars[position === lastPosition && position > 0 ? position - 1 : position] = ' ';
      }
      lastPosition = position;
    }
  }
}
