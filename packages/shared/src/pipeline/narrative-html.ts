/**
 * Narrative rendering
 *
 * Turns the narrative lines of one section into the html_text of its text
 * record. Markdown headers and **bold** become <strong>, bullet runs become a
 * <ul>, and remaining lines are joined with <br>.
 */

import type { NarrativeLine } from './pipeline-context';
import { collapseWhitespace } from './text-utils';

const PRIVATE_USE_RE = /[\uE000-\uF8FF]/g;
const BULLET_RE = /^[-*•▪◦‣●]\s+(.+)$/;
const HEADER_RE = /^#{1,6}\s+(.+)$/;

type Part = { kind: 'line'; html: string } | { kind: 'list'; items: string[] };

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function cleanText(text: string): string {
  return collapseWhitespace(
    text.replace(PRIVATE_USE_RE, '').replace(/[‘’]/g, "'").replace(/[“”]/g, '"')
  );
}

/** Emphasis pairs to <strong>; orphan markers dropped */
function inlineMarkup(escaped: string): string {
  return escaped
    .replace(/\*\*(.+?)\*\*/g, '<strong>$1</strong>')
    .replace(/\*\*/g, '')
    .replace(/^#+(?:\s+|$)/, '')
    .trim();
}

function renderPart(part: Part): string {
  if (part.kind === 'list') {
    return `<ul>${part.items.map((item) => `<li>${item}</li>`).join('')}</ul>`;
  }
  return part.html;
}

export function renderNarrativeHtml(lines: readonly NarrativeLine[]): string {
  const parts: Part[] = [];

  for (const line of lines) {
    const text = cleanText(line.text);
    if (!text) continue;

    const bullet = BULLET_RE.exec(text);
    if (bullet) {
      const item = inlineMarkup(escapeHtml(bullet[1]));
      const last = parts[parts.length - 1];
      if (last && last.kind === 'list') {
        last.items.push(item);
      } else {
        parts.push({ kind: 'list', items: [item] });
      }
      continue;
    }

    const header = HEADER_RE.exec(text);
    if (header) {
      const inner = escapeHtml(header[1].replace(/\*\*/g, '').trim());
      if (inner) parts.push({ kind: 'line', html: `<strong>${inner}</strong>` });
      continue;
    }

    let html = inlineMarkup(escapeHtml(text));
    if (!html) continue;
    if (line.bold && !html.startsWith('<strong>')) {
      html = `<strong>${html}</strong>`;
    }
    parts.push({ kind: 'line', html });
  }

  return parts
    .map((part, i) => {
      const previous = parts[i - 1];
      const separator = i > 0 && part.kind === 'line' && previous.kind === 'line' ? '<br>' : '';
      return separator + renderPart(part);
    })
    .join('');
}
