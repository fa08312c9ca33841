// Email body to text conversion.
// HTML bodies become Markdown through turndown, then remark normalizes the result,
// so the `body` column is readable and searchable with plain SQL LIKE/instr.
// Email HTML is mostly layout tables, tracking pixels and hidden preheaders; the
// rules below drop or unwrap those before anything reaches the database.

import TurndownService from 'turndown'
import { remark } from 'remark'

const turndown = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced',
  bulletListMarker: '-',
})

function hasClass(node: HTMLElement, name: string): boolean {
  return (node.getAttribute('class') ?? '').split(/\s+/).includes(name)
}

function isTrackingPixel(node: HTMLElement): boolean {
  if (node.nodeName !== 'IMG') return false
  const tiny = (value: string | null) => value === '0' || value === '1'
  if (tiny(node.getAttribute('width')) && tiny(node.getAttribute('height'))) return true
  const src = node.getAttribute('src') ?? ''
  return ['track', 'pixel', 'beacon'].some((marker) => src.includes(marker))
}

function isHidden(node: HTMLElement): boolean {
  const style = node.getAttribute('style') ?? ''
  if (/display\s*:\s*none/i.test(style) || /mso-hide\s*:\s*all/i.test(style)) return true
  if (node.hasAttribute('hidden')) return true
  return hasClass(node, 'preheader') || hasClass(node, 'preview-text')
}

// Non-content: <style>/<head>/<script>, hidden preheaders, open-tracking images.
turndown.addRule('email-noise', {
  filter: (node) =>
    ['STYLE', 'HEAD', 'SCRIPT'].includes(node.nodeName) || isTrackingPixel(node) || isHidden(node),
  replacement: () => '',
})

turndown.addRule('images', {
  filter: 'img',
  replacement: (_content, node) => {
    const alt = node.getAttribute('alt') ?? ''
    return alt ? `[image: ${alt}]` : ''
  },
})

// Quoted history from Gmail (gmail_quote/gmail_extra), Outlook (divRplyFwdMsg,
// appendonsend) and Apple Mail (<blockquote type="cite">) duplicates older rows.
turndown.addRule('quoted-replies', {
  filter: (node) => {
    if (node.nodeName === 'DIV') {
      if (hasClass(node, 'gmail_quote') || hasClass(node, 'gmail_extra')) return true
      const id = node.getAttribute('id') ?? ''
      return id === 'appendonsend' || id === 'divRplyFwdMsg'
    }
    return node.nodeName === 'BLOCKQUOTE' && node.getAttribute('type') === 'cite'
  },
  replacement: () => '',
})

// Layout tables (presentation role, fixed width/align, zeroed border/padding) keep
// only their cell content; they are positioning, not data.
turndown.addRule('layout-tables', {
  filter: (node) => {
    if (node.nodeName !== 'TABLE') return false
    if ((node.getAttribute('role') ?? '').toLowerCase() === 'presentation') return true
    if (node.getAttribute('width') || node.getAttribute('align')) return true
    if ((node.getAttribute('border') ?? '').trim() === '0') return true
    return Boolean(node.getAttribute('cellpadding') || node.getAttribute('cellspacing'))
  },
  replacement: (content) => content,
})

export function htmlToMarkdown(html: string): string {
  const cleaned = html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<o:p>[\s\S]*?<\/o:p>/gi, '')
    .replace(/<!\[if[\s\S]*?<!\[endif\]>/gi, '')

  // nbsp and zero-width characters would otherwise survive as odd whitespace
  const md = turndown.turndown(cleaned).replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, ' ')

  // remark escapes `[` in our [image: ...] placeholders and `&` inside URLs; undo both
  return remark()
    .processSync(md)
    .toString()
    .replace(/\\\[image:/g, '[image:')
    .replace(/\(([^\n)]*)\)/g, (whole: string, inner: string) => {
      if (!/(https?:\/\/|mailto:)/i.test(inner)) return whole
      return `(${inner.replace(/\\&/g, '&')})`
    })
    .trim()
}

/** Text for the `body` column: HTML is converted, anything else is trimmed as-is. */
export function renderEmailBody(body: string, mimeType: string): string {
  if (mimeType === 'text/html') {
    return htmlToMarkdown(body)
  }
  return body.trim()
}
