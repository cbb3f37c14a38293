import { stripMarkdownFormatting } from '../transcript/text.js'
import { formatDuration, formatRange } from './format.js'
import type { DeckDocument, DeckSlide, RenderOptions } from './types.js'

// Transcript text is data; keep it from opening raw HTML in the rendered page.
export function escapeInlineHtml(text: string): string {
  return text.replace(/[<&]/g, (char) => `\\${char}`)
}

export const slideAnchor = (slide: DeckSlide) => `slide-${slide.number}`

function hasEnhancement(slide: DeckSlide): boolean {
  return Boolean(slide.enhancedText && slide.enhancedText !== slide.transcriptText)
}

function renderSlide(slide: DeckSlide, options: RenderOptions): string[] {
  const heading = options.includeTimestamps
    ? `## Slide ${slide.number} · ${formatRange(slide.window.start, slide.window.end)}`
    : `## Slide ${slide.number}`
  const lines: string[] = [`<a id="${slideAnchor(slide)}"></a>`, '', heading, '']
  if (slide.screenshotPath) {
    lines.push(`![Slide ${slide.number}](${slide.screenshotPath})`, '')
  }

  const original = escapeInlineHtml(slide.transcriptText)
  if (hasEnhancement(slide)) {
    const enhanced = escapeInlineHtml(stripMarkdownFormatting(slide.enhancedText ?? ''))
    lines.push('**Enhanced Transcript:**', '', enhanced, '')
    if (slide.keyPoints.length > 0) {
      lines.push('**Key Points:**', '')
      for (const point of slide.keyPoints) lines.push(`- ${escapeInlineHtml(point)}`)
      lines.push('')
    }
    if (original) {
      lines.push('<details>', '<summary>Original Transcript</summary>', '', original, '', '</details>', '')
    }
  } else if (original) {
    lines.push('**Transcript:**', '', original, '')
  } else {
    lines.push('*No transcript available for this slide.*', '')
  }
  lines.push('---', '')
  return lines
}

export function renderDeckMarkdown(deck: DeckDocument, options: RenderOptions): string {
  const lines: string[] = [`# ${deck.title}`, '', `*Generated on ${deck.generatedAt}*`, '']
  lines.push(`**Source:** ${deck.source}  `)
  if (deck.durationSeconds != null) {
    lines.push(`**Video Duration:** ${formatDuration(deck.durationSeconds)}  `)
  }
  lines.push(`**Total Slides:** ${deck.slides.length}`, '')

  const enhancedCount = deck.slides.filter(hasEnhancement).length
  if (enhancedCount > 0) {
    lines.push(`**Enhanced Content:** ${enhancedCount} slides have enhanced transcripts`, '')
  }

  if (options.includeNavigation && deck.slides.length > 0) {
    lines.push('## Table of Contents', '')
    for (const slide of deck.slides) {
      const label = options.includeTimestamps
        ? `Slide ${slide.number} (${formatRange(slide.window.start, slide.window.end)})`
        : `Slide ${slide.number}`
      lines.push(`- [${label}](#${slideAnchor(slide)})`)
    }
    lines.push('', '---', '')
  }

  for (const slide of deck.slides) lines.push(...renderSlide(slide, options))
  return `${lines.join('\n').trimEnd()}\n`
}
