import { EngineConfigurationError } from '../core/errors.js';
import { DEFAULT_AUTO_FIT_OPTIONS, type AutoFitOptions, type TextRole, type TextRun } from '../types/index.js';
import { textLength, type TextParagraph } from './TextModel.js';

/**
 * Text after fitting it to a placeholder.
 */
export interface FittedText {
  paragraphs: TextParagraph[];
  /** Font scale to apply, 1 = 100% */
  fontScale: number;
  truncated: boolean;
  /** Character count before fitting */
  originalLength: number;
}

/**
 * Deterministic shrink-then-truncate policy for text placeholders.
 *
 * A placeholder holds `budget / s²` characters at font scale `s`. Scales are
 * tried from 100% downwards in fixed steps; the first that fits wins. Text
 * that does not fit at the floor is cut to the floor's capacity, ellipsis
 * included.
 */
export class AutoFitPolicy {
  constructor(private readonly options: AutoFitOptions = DEFAULT_AUTO_FIT_OPTIONS) {
    const { scaleStep, minScale, budgets } = options;
    if (!(scaleStep > 0 && scaleStep < 1)) {
      throw new EngineConfigurationError('autoFit.scaleStep must be between 0 and 1', { scaleStep });
    }
    if (!(minScale > 0 && minScale <= 1)) {
      throw new EngineConfigurationError('autoFit.minScale must be in (0, 1]', { minScale });
    }
    for (const [role, budget] of Object.entries(budgets)) {
      if (!(Number.isInteger(budget) && budget > 0)) {
        throw new EngineConfigurationError(`autoFit budget for "${role}" must be a positive integer`, { role, budget });
      }
    }
  }

  /**
   * Characters a placeholder of the given role holds at a font scale.
   */
  capacity(role: TextRole, scale: number): number {
    return Math.floor(this.options.budgets[role] / (scale * scale));
  }

  /**
   * Largest scale at which `length` characters fit, or the floor when none does.
   */
  scaleFor(length: number, role: TextRole): number {
    if (length <= this.options.budgets[role]) {
      return 1;
    }
    for (let step = 1; ; step++) {
      const scale = Math.round((1 - step * this.options.scaleStep) * 1000) / 1000;
      if (scale < this.options.minScale) break;
      if (length <= this.capacity(role, scale)) return scale;
    }
    return this.options.minScale;
  }

  /**
   * Fits paragraphs to a role's budget.
   */
  fit(paragraphs: readonly TextParagraph[], role: TextRole): FittedText {
    const originalLength = textLength(paragraphs);
    const fontScale = this.scaleFor(originalLength, role);
    const capacity = this.capacity(role, fontScale);

    if (originalLength <= capacity) {
      return { paragraphs: [...paragraphs], fontScale, truncated: false, originalLength };
    }

    return {
      paragraphs: this.truncate(paragraphs, capacity),
      fontScale,
      truncated: true,
      originalLength,
    };
  }

  /**
   * Keeps the first `capacity - ellipsis.length` characters and appends the
   * ellipsis to the run where the cut falls.
   */
  private truncate(paragraphs: readonly TextParagraph[], capacity: number): TextParagraph[] {
    const { ellipsis } = this.options;
    let remaining = Math.max(0, capacity - ellipsis.length);
    const kept: TextParagraph[] = [];

    for (const paragraph of paragraphs) {
      const runs: TextRun[] = [];
      for (const run of paragraph.runs) {
        if (run.text.length <= remaining) {
          runs.push(run);
          remaining -= run.text.length;
          continue;
        }
        runs.push({ ...run, text: run.text.slice(0, cutPoint(run.text, remaining)) + ellipsis });
        kept.push({ ...paragraph, runs });
        return kept;
      }
      kept.push({ ...paragraph, runs });
    }
    return kept;
  }
}

/**
 * Moves a cut back by one code unit when it would split a surrogate pair.
 */
function cutPoint(text: string, index: number): number {
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  const splitsPair = before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
  return splitsPair ? index - 1 : index;
}
