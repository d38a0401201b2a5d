import { ConfigurationError } from '../errors.js'

export const PROMPT_STYLES = ['default', 'empathetic', 'analytical', 'motivational', 'socratic', 'custom'] as const

export type PromptStyle = typeof PROMPT_STYLES[number]

const STYLE_MODIFIERS: Record<Exclude<PromptStyle, 'custom'>, string> = {
  default: '',
  empathetic: [
    'STYLE - Empathetic:',
    '- Open by acknowledging how the person feels before offering anything else.',
    '- Connect their feelings to their trait profile with compassion.',
    '- Offer gentle guidance and keep the language soft.'
  ].join('\n'),
  analytical: [
    'STYLE - Analytical:',
    '- Open with a short analysis of the trait scores that matter for the question.',
    '- Quote the scores and structure the answer as numbered points.',
    '- Make cause and effect explicit and prefer measurable steps.'
  ].join('\n'),
  motivational: [
    'STYLE - Motivational:',
    '- Open by naming a strength from their dominant traits.',
    '- Frame every challenge as an opportunity and keep the energy up.',
    '- Close with a concrete call to action.'
  ].join('\n'),
  socratic: [
    'STYLE - Socratic:',
    '- Guide mainly through questions, at least three of them.',
    '- Give brief context after each question and let the person reach the insight.',
    '- Close with a question that invites reflection.'
  ].join('\n')
}

export interface ResolvedStyle {
  style: PromptStyle
  modifier: string
  /** Set when the configured style could not be honoured and `default` was used. */
  error: ConfigurationError | null
}

function isPromptStyle(value: string): value is PromptStyle {
  return PROMPT_STYLES.some(s => s === value)
}

export function resolveStyle(style: string | null | undefined, customModifier: string | null | undefined): ResolvedStyle {
  if (!style || !isPromptStyle(style)) {
    return {
      style: 'default',
      modifier: STYLE_MODIFIERS.default,
      error: style ? new ConfigurationError(`Unknown prompt style "${style}"`) : null
    }
  }

  if (style === 'custom') {
    const trimmed = customModifier?.trim()
    if (!trimmed) {
      return {
        style: 'default',
        modifier: STYLE_MODIFIERS.default,
        error: new ConfigurationError('Prompt style "custom" requires customStyleModifier')
      }
    }
    return { style: 'custom', modifier: customModifier ?? '', error: null }
  }

  return { style, modifier: STYLE_MODIFIERS[style], error: null }
}

export function applyStyle(basePrompt: string, resolved: ResolvedStyle): string {
  return resolved.modifier ? `${basePrompt}\n\n${resolved.modifier}` : basePrompt
}
