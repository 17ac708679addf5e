/**
 * Text preprocessing ahead of embedding generation.
 *
 * Steps run in exactly the order the caller lists them.
 */

import { DEFAULT_MAX_TEXT_LENGTH } from '@scriptdex/core';

export type PreprocessingStep =
  | 'lowercase'
  | 'remove_punctuation'
  | 'remove_extra_whitespace'
  | 'normalize_unicode'
  | 'remove_urls'
  | 'remove_emails'
  | 'remove_numbers'
  | 'truncate'
  | 'expand_contractions';

export const PREPROCESSING_STEPS: readonly PreprocessingStep[] = [
  'lowercase',
  'remove_punctuation',
  'remove_extra_whitespace',
  'normalize_unicode',
  'remove_urls',
  'remove_emails',
  'remove_numbers',
  'truncate',
  'expand_contractions',
];

export const DEFAULT_PREPROCESSING_STEPS: readonly PreprocessingStep[] = ['remove_extra_whitespace', 'normalize_unicode'];

export interface TextPreprocessor {
  process(text: string): string;
}

// ASCII punctuation
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;
const URL = /https?:\/\/\S+|www\.\S+/g;
const EMAIL = /\S+@\S+/g;
const DIGITS = /\d+/g;

// Longer forms first so "don't" is not consumed by "n't"
const CONTRACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/don't/gi, 'do not'],
  [/won't/gi, 'will not'],
  [/can't/gi, 'cannot'],
  [/n't/gi, ' not'],
  [/'re/gi, ' are'],
  [/'ve/gi, ' have'],
  [/'ll/gi, ' will'],
  [/'d/gi, ' would'],
  [/'m/gi, ' am'],
];

export interface StandardPreprocessorOptions {
  steps?: readonly PreprocessingStep[];
  /** Length cap for the `truncate` step (default 8000) */
  maxTextLength?: number;
}

export class StandardPreprocessor implements TextPreprocessor {
  readonly steps: readonly PreprocessingStep[];
  readonly maxTextLength: number;

  constructor(options: StandardPreprocessorOptions = {}) {
    this.steps = options.steps && options.steps.length > 0 ? [...options.steps] : DEFAULT_PREPROCESSING_STEPS;
    this.maxTextLength = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
  }

  process(text: string): string {
    return this.steps.reduce((acc, step) => this.applyStep(acc, step), text);
  }

  private applyStep(text: string, step: PreprocessingStep): string {
    switch (step) {
      case 'lowercase':
        return text.toLowerCase();
      case 'remove_punctuation':
        return text.replace(PUNCTUATION, '');
      case 'remove_extra_whitespace':
        return text.split(/\s+/).filter(Boolean).join(' ');
      case 'normalize_unicode':
        return text.normalize('NFKD');
      case 'remove_urls':
        return text.replace(URL, '');
      case 'remove_emails':
        return text.replace(EMAIL, '');
      case 'remove_numbers':
        return text.replace(DIGITS, '');
      case 'truncate':
        return text.length > this.maxTextLength ? `${text.slice(0, this.maxTextLength)}...` : text;
      case 'expand_contractions':
        return CONTRACTIONS.reduce((acc, [pattern, expansion]) => acc.replace(pattern, expansion), text);
    }
  }
}

// ─── Screenplay ─────────────────────────────────────────────

const TRANSITION = /(?:SMASH |MATCH |JUMP )?CUT TO:|FADE IN:|FADE OUT:|DISSOLVE TO:/g;
const TRANSITION_LINE = /^(?:(?:SMASH |MATCH |JUMP )?CUT TO:|FADE IN:|FADE OUT:|DISSOLVE TO:)$/;
const SCENE_HEADING = /^(?:INT|EXT|EST|INT\.?\/EXT|I\/E)[.\s]/;
const PARENTHETICAL = /[ \t]*\(([^)\n]+)\)[ \t]*/g;

function isUpperCase(s: string): boolean {
  return s === s.toUpperCase() && s !== s.toLowerCase();
}

function titleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Screenplay-aware cleanup: character cues, parentheticals, transitions
 * and blank-line runs. Scene headings are left as written.
 */
export class ScreenplayPreprocessor implements TextPreprocessor {
  process(text: string): string {
    let out = this.normalizeCharacterNames(text);
    out = this.normalizeParentheticals(out);
    out = this.isolateTransitions(out);
    return this.collapseWhitespace(out);
  }

  /** Short all-caps lines are usually character cues: MARA → Mara. */
  private normalizeCharacterNames(text: string): string {
    return text
      .split('\n')
      .map((line) => {
        const stripped = line.trim();
        if (!stripped || !isUpperCase(stripped)) return line;
        if (stripped.split(/\s+/).length > 3) return line;
        if (TRANSITION_LINE.test(stripped) || SCENE_HEADING.test(stripped)) return line;
        return titleCase(stripped);
      })
      .join('\n');
  }

  /** One space outside the parentheses, none inside. */
  private normalizeParentheticals(text: string): string {
    return text
      .split('\n')
      .map((line) =>
        line
          .replace(PARENTHETICAL, (_m, inner: string, offset: number) => `${offset === 0 ? '' : ' '}(${inner.trim()}) `)
          .trimEnd(),
      )
      .join('\n');
  }

  private isolateTransitions(text: string): string {
    return text.replace(TRANSITION, (match: string, offset: number) => {
      const before = offset === 0 ? '' : '\n\n';
      const after = offset + match.length === text.length ? '' : '\n\n';
      return `${before}${match}${after}`;
    });
  }

  private collapseWhitespace(text: string): string {
    const trimmed = text
      .split('\n')
      .map((line) => line.trimEnd())
      .join('\n');
    return trimmed.replace(/\n{3,}/g, '\n\n');
  }
}
