export const DEFAULT_MAX_TEXT_LENGTH = 100;

const TAG_PATTERN = /<[^>]*>/g;
const SCRIPT_SCHEME_PATTERN = /javascript:/gi;
const EVENT_HANDLER_PATTERN = /on\w+\s*=/gi;

/**
 * Strips markup, `javascript:` schemes and inline event handlers from free text, then truncates
 * it. Applied to every name, chat line and guess before it is stored or sent to other players.
 */
export function sanitizeText(text: unknown, maxLength = DEFAULT_MAX_TEXT_LENGTH): string {
  if (typeof text !== "string" || text.length === 0) {
    return "";
  }

  const cleaned = text
    .replace(TAG_PATTERN, "")
    .replace(SCRIPT_SCHEME_PATTERN, "")
    .replace(EVENT_HANDLER_PATTERN, "")
    .trim();

  return cleaned.slice(0, maxLength);
}
