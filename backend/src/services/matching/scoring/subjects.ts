import { clamp } from './math.js';

const SYNONYMS: Record<string, string> = {
  math: 'mathematics',
  maths: 'mathematics',
  bio: 'biology',
  chem: 'chemistry'
};

// A category covers each of its members, and a member partially covers its category.
const CATEGORIES: Record<string, readonly string[]> = {
  science: ['physics', 'chemistry', 'biology']
};

const SUBJECT_SEPARATORS = /[,;/]/;

export type OverlapKind = 'strong' | 'partial' | 'none';

export type SubjectOverlap = {
  ratio: number;
  matched: string[];
  kind: OverlapKind;
  explanation: string;
};

export function normalizeSubject(raw: string): string {
  const key = raw.trim().replace(/\s+/g, ' ').toLowerCase();
  return SYNONYMS[key] ?? key;
}

/**
 * Split free-text subject entries ("Maths, Physics") into canonical names.
 */
export function expandSubjects(entries: readonly string[]): Set<string> {
  const result = new Set<string>();
  for (const entry of entries) {
    for (const part of entry.split(SUBJECT_SEPARATORS)) {
      const canonical = normalizeSubject(part);
      if (canonical) result.add(canonical);
    }
  }
  return result;
}

function covers(requested: string, offered: string): boolean {
  if (requested === offered) return true;
  if (CATEGORIES[offered]?.includes(requested)) return true;
  return CATEGORIES[requested]?.includes(offered) ?? false;
}

function describe(kind: OverlapKind, ratio: number, matched: string[], total: number): string {
  if (total === 0) return 'No subjects requested to compare.';
  if (kind === 'none') return 'No overlap with the requested subjects.';
  const names = matched.join(', ');
  if (ratio === 1) return `Full subject match: ${names}.`;
  const label = kind === 'strong' ? 'Strong subject overlap' : 'Partial subject overlap';
  return `${label}: ${names} (${matched.length} of ${total} requested).`;
}

/**
 * Share of requested subjects that some offered subject satisfies.
 * Matched names are reported as the learner wrote them.
 */
export function scoreSubjectOverlap(
  requested: readonly string[],
  offered: readonly string[],
  strongRatio = 0.75
): SubjectOverlap {
  const offeredSet = expandSubjects(offered);

  const seen = new Set<string>();
  const matched: string[] = [];
  for (const raw of requested) {
    const canonical = normalizeSubject(raw);
    if (!canonical || seen.has(canonical)) continue;
    seen.add(canonical);
    for (const candidate of offeredSet) {
      if (covers(canonical, candidate)) {
        matched.push(raw.trim());
        break;
      }
    }
  }

  const ratio = seen.size ? clamp(matched.length / seen.size) : 0;
  const kind: OverlapKind = ratio === 0 ? 'none' : ratio >= strongRatio ? 'strong' : 'partial';

  return {
    ratio,
    matched,
    kind,
    explanation: describe(kind, ratio, matched, seen.size)
  };
}
