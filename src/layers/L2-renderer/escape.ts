/**
 * Escape the characters that would open raw HTML inside the digest.
 * Pure and synchronous; nothing else in the text is touched.
 */
export function escapeMarkdown(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
