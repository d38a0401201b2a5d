import type { TraitProfile } from '../memory/types.js'

export type TraitBand = 'dominant' | 'balanced' | 'suppressed'

export const TRAIT_SCORE_MIN = 0
export const TRAIT_SCORE_MAX = 10

/**
 * Bands: [7,10] dominant, [4,6] balanced, [1,3] suppressed. Fractional
 * scores between bands (3.5, 6.5) count as balanced and anything below 1
 * as suppressed. Returns null for values outside [0,10].
 */
export function classifyTrait(score: number): TraitBand | null {
  if (!Number.isFinite(score) || score < TRAIT_SCORE_MIN || score > TRAIT_SCORE_MAX) {
    return null
  }
  if (score >= 7) return 'dominant'
  if (score > 3) return 'balanced'
  return 'suppressed'
}

export interface ClassifiedTrait {
  name: string
  score: number
  band: TraitBand
}

export interface TraitBands {
  dominant: ClassifiedTrait[]
  balanced: ClassifiedTrait[]
  suppressed: ClassifiedTrait[]
  /** Names whose score could not be classified. */
  rejected: string[]
}

export function groupTraits(profile: TraitProfile): TraitBands {
  const bands: TraitBands = { dominant: [], balanced: [], suppressed: [], rejected: [] }

  for (const [name, score] of Object.entries(profile)) {
    const band = classifyTrait(score)
    if (band === null) {
      bands.rejected.push(name)
      continue
    }
    bands[band].push({ name, score, band })
  }

  const byScoreDesc = (a: ClassifiedTrait, b: ClassifiedTrait) => b.score - a.score || a.name.localeCompare(b.name)
  bands.dominant.sort(byScoreDesc)
  bands.balanced.sort(byScoreDesc)
  bands.suppressed.sort((a, b) => a.score - b.score || a.name.localeCompare(b.name))

  return bands
}

export function formatTraitName(name: string): string {
  return name
    .split(/[_\s-]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

function describe(traits: ClassifiedTrait[]): string {
  return traits.map(t => `${formatTraitName(t.name)} (${t.score.toFixed(1)}/10)`).join(', ')
}

/**
 * Plain-language summary of a trait profile, grouped by band. Returns null
 * when nothing in the profile can be classified.
 */
export function buildTraitNarrative(profile: TraitProfile): string | null {
  const bands = groupTraits(profile)
  const lines: string[] = []

  if (bands.dominant.length > 0) {
    lines.push(`Dominant traits (natural strengths): ${describe(bands.dominant)}`)
  }
  if (bands.balanced.length > 0) {
    lines.push(`Balanced traits: ${describe(bands.balanced)}`)
  }
  if (bands.suppressed.length > 0) {
    lines.push(`Suppressed traits (areas needing attention): ${describe(bands.suppressed)}`)
  }

  return lines.length > 0 ? lines.join('\n') : null
}
