import type { EnhancementLevel, ParsedEnhancement, PromptStyle } from './types.js'

const LEVEL_PROMPTS: Record<EnhancementLevel, string> = {
  basic: `Improve this transcript segment:
- Fix grammar and spelling errors
- Improve sentence structure and clarity
- Use paragraphs where appropriate
- Keep a factual and descriptive tone

Transcript: {text}

Provide only the corrected text.`,
  detailed: `Enhance this transcript segment, which may cover several slides:
- Fix transcription errors
- Improve sentence structure and clarity
- Add factual explanations and context
- Structure the content logically
- Keep the text concise and focused
- Extract key concepts

Transcript: {text}

Format the response as:
ENHANCED_TEXT: [enhanced transcript, concise]
KEY_POINTS: [bullet points of key concepts]`,
  academic: `Convert this transcript segment to academic language:
- Use formal, scholarly language
- Improve sentence structure and clarity
- Add proper context and explanations
- Structure the content logically
- Include key concepts and definitions

Transcript: {text}

Format the response as:
ACADEMIC_TEXT: [academic version]
KEY_CONCEPTS: [important concepts and definitions]`,
}

const STYLE_INSTRUCTIONS: Record<PromptStyle, string | null> = {
  clear: null,
  academic: 'Write in formal academic language.',
  conversational: 'Keep the tone conversational and engaging.',
  technical: 'Favor technical precision over simplification.',
}

const SECTION_MARKERS = [
  { text: 'ENHANCED_TEXT:', points: 'KEY_POINTS:' },
  { text: 'ACADEMIC_TEXT:', points: 'KEY_CONCEPTS:' },
] as const

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match)
}

export function buildEnhancementPrompt({
  text,
  level,
  style,
  template,
}: {
  text: string
  level: EnhancementLevel
  style: PromptStyle
  template?: string | null
}): string {
  if (template) return fillTemplate(template, { text, level, style })
  const base = fillTemplate(LEVEL_PROMPTS[level], { text })
  const instruction = STYLE_INSTRUCTIONS[style]
  return instruction ? `${instruction}\n\n${base}` : base
}

export function parseKeyPoints(block: string): string[] {
  const points: string[] = []
  for (const raw of block.split('\n')) {
    const line = raw.trim()
    if (!line) continue
    if (line.startsWith('KEY_POINTS:') || line.startsWith('KEY_CONCEPTS:')) continue
    const bullet = /^[-•*]\s*(.*)$/.exec(line)
    const point = bullet ? (bullet[1] ?? '').trim() : line
    if (point) points.push(point)
  }
  return points
}

/**
 * Reads the sectioned reply formats; anything else is taken as the rewritten text.
 */
export function parseEnhancementResponse(response: string): ParsedEnhancement {
  for (const marker of SECTION_MARKERS) {
    const start = response.indexOf(marker.text)
    if (start === -1) continue
    const body = response.slice(start + marker.text.length)
    const pointsAt = body.indexOf(marker.points)
    if (pointsAt === -1) return { text: body.trim(), keyPoints: [] }
    return {
      text: body.slice(0, pointsAt).trim(),
      keyPoints: parseKeyPoints(body.slice(pointsAt + marker.points.length)),
    }
  }
  return { text: response.trim(), keyPoints: [] }
}
