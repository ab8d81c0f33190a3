import type { EventDraft, EventKind } from '../core/types.js'
import { tokenize } from '../utils/text.js'
import { clamp, roundTo } from '../utils/validation.js'

export interface ScoringPolicy {
  /** Deterministic importance in [0, 1]. */
  score(draft: EventDraft): number
}

export const DEFAULT_KIND_WEIGHTS: Readonly<Record<EventKind, number>> = {
  task: 0.6,
  thought: 0.2,
  action: 0.4,
  observation: 0.3,
  answer: 0.8,
}

const DENSITY_WEIGHT = 0.1
const DENSITY_SATURATION_TOKENS = 40
const CORRECTION_BONUS = 0.2

export class HeuristicScoringPolicy implements ScoringPolicy {
  private weights: Record<EventKind, number>

  constructor(weights: Partial<Record<EventKind, number>> = {}) {
    this.weights = { ...DEFAULT_KIND_WEIGHTS, ...weights }
  }

  score(draft: EventDraft): number {
    let total = this.weights[draft.kind]
    total += this.density(draft.content)
    if (draft.correction) total += CORRECTION_BONUS
    return roundTo(clamp(total, 0, 1), 3)
  }

  // Longer, less repetitive content scores slightly higher
  private density(content: string): number {
    const tokens = tokenize(content)
    if (tokens.length === 0) return 0
    const unique = new Set(tokens).size
    const length = Math.min(1, tokens.length / DENSITY_SATURATION_TOKENS)
    return DENSITY_WEIGHT * length * (unique / tokens.length)
  }
}
