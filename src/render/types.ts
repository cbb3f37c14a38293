import type { SlideWindow } from '../slides/types.js'

export type DeckFormat = 'md' | 'html'

export type DeckSlide = {
  number: number
  window: SlideWindow
  /** Relative to the document, e.g. `pics/screenshot_001.png`. */
  screenshotPath: string | null
  transcriptText: string
  enhancedText: string | null
  keyPoints: string[]
}

export type DeckDocument = {
  title: string
  source: string
  generatedAt: string
  durationSeconds: number | null
  slides: DeckSlide[]
}

export type RenderOptions = {
  includeTimestamps: boolean
  includeNavigation: boolean
}
