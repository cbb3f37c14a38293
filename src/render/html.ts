import { readFile } from 'node:fs/promises'

import MarkdownIt from 'markdown-it'

import { renderDeckMarkdown } from './markdown.js'
import type { DeckDocument, RenderOptions } from './types.js'

const DEFAULT_TEMPLATE_URL = new URL('../../templates/deck.html', import.meta.url)

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

export async function loadDeckTemplate(templatePath?: string | null): Promise<string> {
  return readFile(templatePath ?? DEFAULT_TEMPLATE_URL, 'utf8')
}

export function fillDeckTemplate(template: string, { title, body }: { title: string; body: string }) {
  return template
    .replace(/\{\{title\}\}/g, () => escapeHtml(title))
    .replace(/\{\{body\}\}/g, () => body)
}

/**
 * Renders the Markdown deck through markdown-it and places it in the page template.
 */
export function renderDeckHtml(deck: DeckDocument, options: RenderOptions, template: string): string {
  const md = new MarkdownIt({ html: true, linkify: false, typographer: false })
  const body = md.render(renderDeckMarkdown(deck, options))
  return fillDeckTemplate(template, { title: deck.title, body })
}
