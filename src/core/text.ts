/** Telegram's limit on message text length. */
export const TELEGRAM_MESSAGE_MAX = 4096

/** Cuts `text` to at most `max` characters, marking the cut with an ellipsis. */
export function clampText(text: string, max = TELEGRAM_MESSAGE_MAX): string {
  if (text.length <= max) return text
  return `${text.slice(0, max - 1)}…`
}
