/**
 * PII Classifier
 *
 * Evaluates an ordered rule table over a text and resolves overlapping
 * candidates: the longest match wins, and for spans of equal length the
 * earliest-registered rule wins. Detection never throws; a rule that finds
 * nothing simply contributes no candidates.
 */

export interface PIIRule {
  kind: string;
  /** Must carry the global flag */
  regex: RegExp;
  /**
   * Narrow, split or reject a raw match. Returns the kept [start, end)
   * offsets relative to the match; an empty list drops it.
   */
  refine?: (value: string) => Span[];
}

export interface Span {
  start: number;
  end: number;
}

export interface PIIDetection {
  kind: string;
  value: string;
  startIndex: number;
  endIndex: number;
}

interface Candidate extends PIIDetection {
  order: number;
}

/** Placeholder written in place of a fixed-category match */
export function placeholderFor(kind: string): string {
  return `[${kind.toUpperCase()}_REDACTED]`;
}

// ───── Fixed Categories (registration order is the tie-break order) ─────

export const FIXED_PII_RULES: readonly PIIRule[] = [
  {
    kind: 'email',
    regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/gi,
  },
  {
    // 555-123-4567, 555.123.4567, 555 123 4567, (555) 123-4567, +1 555 123 4567
    kind: 'phone',
    regex: /(?:\+?1[-.\s]?)?(?:\(\d{3}\)\s?|\b\d{3}[-.\s]?)\d{3}[-.\s]?\d{4}\b/g,
  },
  {
    kind: 'ssn',
    regex: /\b\d{3}-\d{2}-\d{4}\b/g,
  },
  {
    kind: 'credit_card',
    regex: /\b(?:\d{4}[-\s]?){3}\d{4}\b/g,
  },
  {
    kind: 'address',
    // 42 Main Street, 1600 N 5th Ave: every word between number and suffix is capitalised or numeric
    regex:
      /\b\d{1,6}\s+(?:[A-Z0-9][A-Za-z0-9.'-]*\s+){1,4}?(?:[Ss]treet|St|[Aa]venue|Ave|[Rr]oad|Rd|[Bb]oulevard|Blvd|[Dd]rive|Dr|[Cc]ourt|Ct|[Ll]ane|Ln|[Ww]ay|[Pp]lace|Pl)\b\.?/g,
  },
  {
    kind: 'ip',
    regex: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
  },
  {
    kind: 'api_key',
    regex: /\b(?:(?:sk|pk|rk|ghp|gho|xoxb|xoxp)[-_][A-Za-z0-9_-]{16,}|[A-Za-z0-9]{32,})\b/g,
  },
];

// ───── Entity Rules ─────────────────────────────────────────────

const PERSON_WITH_HONORIFIC = /\b(?:Dr|Mr|Mrs|Ms|Prof)\.?[ \t]+[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+){0,2}\b/g;
const ORGANIZATION =
  /\b(?:[A-Z][A-Za-z0-9&]*[ \t]+){1,3}(?:Inc|LLC|Ltd|Corp|Corporation|Company|GmbH|Foundation|University|Labs)\b\.?/g;
const CAPITALIZED_RUN = /\b[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)+\b/g;

const MIN_NAME_WORDS = 2;
const MAX_NAME_WORDS = 3;

interface Word extends Span {
  text: string;
}

function splitWords(value: string): Word[] {
  const words: Word[] = [];
  const wordPattern = /\S+/g;
  let m: RegExpExecArray | null;
  while ((m = wordPattern.exec(value)) !== null) {
    words.push({ text: m[0], start: m.index, end: m.index + m[0].length });
  }
  return words;
}

/** Cut a stretch of name words into names of two or three words, never leaving one word over. */
function chunkNames(words: readonly Word[]): Span[] {
  const spans: Span[] = [];
  let i = 0;
  while (words.length - i >= MIN_NAME_WORDS) {
    const remaining = words.length - i;
    const size = remaining === 4 ? 2 : Math.min(MAX_NAME_WORDS, remaining);
    spans.push({ start: words[i].start, end: words[i + size - 1].end });
    i += size;
  }
  return spans;
}

/**
 * Split a capitalised run at its non-name words. Each remaining stretch of
 * two or more words becomes one or more names, so the spans hold name words
 * only.
 */
function nameRefiner(nonNameWords: ReadonlySet<string>): NonNullable<PIIRule['refine']> {
  return (value) => {
    const spans: Span[] = [];
    let stretch: Word[] = [];
    for (const word of splitWords(value)) {
      if (nonNameWords.has(word.text.toLowerCase())) {
        spans.push(...chunkNames(stretch));
        stretch = [];
      } else {
        stretch.push(word);
      }
    }
    spans.push(...chunkNames(stretch));
    return spans;
  };
}

/** Keep the honorific and the name words after it, up to the first non-name word. */
function titledNameRefiner(nonNameWords: ReadonlySet<string>): NonNullable<PIIRule['refine']> {
  return (value) => {
    const words = splitWords(value);
    let last = 0;
    while (last + 1 < words.length && !nonNameWords.has(words[last + 1].text.toLowerCase())) last++;
    return last === 0 ? [] : [{ start: 0, end: words[last].end }];
  };
}

/**
 * Person and organization rules, in tie-break order: titled names, then
 * organizations (so "Acme Labs" is not read as a person), then plain
 * capitalised names.
 */
export function entityRules(nonNameWords: ReadonlySet<string>): PIIRule[] {
  return [
    { kind: 'person_name', regex: PERSON_WITH_HONORIFIC, refine: titledNameRefiner(nonNameWords) },
    { kind: 'organization', regex: ORGANIZATION },
    { kind: 'person_name', regex: CAPITALIZED_RUN, refine: nameRefiner(nonNameWords) },
  ];
}

// ───── Classifier ───────────────────────────────────────────────

export class PIIClassifier {
  constructor(private readonly rules: readonly PIIRule[]) {}

  /** Distinct kinds this classifier can detect, in registration order */
  get kinds(): string[] {
    return Array.from(new Set(this.rules.map((r) => r.kind)));
  }

  /**
   * Detect PII spans in the text.
   * Returns non-overlapping detections sorted by position.
   */
  detect(text: string): PIIDetection[] {
    const candidates: Candidate[] = [];

    this.rules.forEach((rule, order) => {
      // Reset regex lastIndex for global patterns
      rule.regex.lastIndex = 0;
      let match: RegExpExecArray | null;

      while ((match = rule.regex.exec(text)) !== null) {
        const value = match[0];
        if (value.length === 0) {
          rule.regex.lastIndex++;
          continue;
        }

        const spans = rule.refine ? rule.refine(value) : [{ start: 0, end: value.length }];
        for (const span of spans) {
          if (span.end <= span.start) continue;
          candidates.push({
            kind: rule.kind,
            value: value.slice(span.start, span.end),
            startIndex: match.index + span.start,
            endIndex: match.index + span.end,
            order,
          });
        }
      }
    });

    return this.resolveOverlaps(candidates);
  }

  hasPII(text: string): boolean {
    return this.detect(text).length > 0;
  }

  /** Rebuild the text with every detection replaced. Detections must not overlap. */
  replace(text: string, detections: readonly PIIDetection[], replacement: (d: PIIDetection) => string): string {
    let result = '';
    let cursor = 0;
    for (const detection of detections) {
      result += text.slice(cursor, detection.startIndex) + replacement(detection);
      cursor = detection.endIndex;
    }
    return result + text.slice(cursor);
  }

  /**
   * Longest match wins; equal lengths go to the earliest-registered rule,
   * then to the leftmost span.
   */
  private resolveOverlaps(candidates: Candidate[]): PIIDetection[] {
    const ranked = [...candidates].sort(
      (a, b) =>
        b.endIndex - b.startIndex - (a.endIndex - a.startIndex) || a.order - b.order || a.startIndex - b.startIndex,
    );

    const accepted: Candidate[] = [];
    for (const candidate of ranked) {
      const overlaps = accepted.some((r) => candidate.startIndex < r.endIndex && candidate.endIndex > r.startIndex);
      if (!overlaps) accepted.push(candidate);
    }

    return accepted
      .sort((a, b) => a.startIndex - b.startIndex)
      .map(({ kind, value, startIndex, endIndex }) => ({ kind, value, startIndex, endIndex }));
  }
}
