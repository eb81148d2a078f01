export type ReplyFormat = 'plain' | 'html';

const CITATION_MARKER = /【[^】]*】/g;
const BOLD = /\*\*(.+?)\*\*/g;
// Link targets must be http(s); one level of balanced parentheses is kept inside the URL.
const MARKDOWN_LINK = /\[([^\]]+)\]\((https?:\/\/[^\s()"]+(?:\([^\s()"]*\)[^\s()"]*)*)\)/g;
const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Clean assistant text before it goes back to the chat transport. File-search
 * citation markers are always removed; `html` escapes the text and then
 * renders bold text and http(s) links for transports that accept a small
 * HTML subset.
 */
export function formatReply(text: string, format: ReplyFormat = 'plain'): string {
  const cleaned = text.replace(CITATION_MARKER, '').trim();

  if (format === 'plain') {
    return cleaned;
  }

  return escapeHtml(cleaned).replace(BOLD, '<b>$1</b>').replace(MARKDOWN_LINK, '<a href="$2">$1</a>');
}
