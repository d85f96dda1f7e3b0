/**
 * Common message utilities for command handlers
 *
 * Notices are built as plain objects with a Markdown-flavoured plain-text
 * body and an HTML rendering of the same content.
 */

import type { NoticeContent } from '../types.js';

export const MATRIX_TO = 'https://matrix.to/#/';

/**
 * "1 server", "2 servers"
 */
export function pluralize(count: number, word: string): string {
  return count === 1 ? `${count} ${word}` : `${count} ${word}s`;
}

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  const escapeMap: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#039;',
  };
  return text.replace(/[&<>"']/g, (char) => escapeMap[char] ?? char);
}

/**
 * Interleave zero-width no-break spaces so clients do not treat the text as
 * a mention of the user.
 */
export function antinotify(text: string): string {
  return [...text].join('\uFEFF');
}

export function userLinkText(userId: string): string {
  return `[${antinotify(userId)}](${MATRIX_TO}${userId})`;
}

export function userLinkHtml(userId: string): string {
  return `<a href="${MATRIX_TO}${escapeHtml(userId)}">${escapeHtml(antinotify(userId))}</a>`;
}

/**
 * "a", "a and b", "a, b and c", "a, b and 3 others"
 */
export function joinUsers(users: readonly string[], render: (userId: string) => string): string {
  const [first, second, third] = users;
  if (first === undefined) return '';
  if (second === undefined) return render(first);
  if (third === undefined) return `${render(first)} and ${render(second)}`;
  if (users.length === 3) return `${render(first)}, ${render(second)} and ${render(third)}`;
  return `${render(first)}, ${render(second)} and ${users.length - 2} others`;
}

/** A notice with no HTML rendering */
export function plainNotice(body: string): NoticeContent {
  return { body };
}

export function bulletList(items: readonly string[]): string {
  return items.map((item) => `* ${item}`).join('\n');
}

export function htmlList(items: readonly string[]): string {
  return `<ul>\n${items.map((item) => `<li>${item}</li>`).join('\n')}\n</ul>`;
}

/** Collapsible section as rendered by Matrix clients */
export function details(summary: string, content: string): string {
  return `<details><summary>${summary}</summary>\n\n${content}\n\n</details>`;
}
