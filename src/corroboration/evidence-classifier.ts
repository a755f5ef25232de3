import { Attribute } from './types';

interface EvidenceRule {
  type: string;
  rank: number;
  matches: (text: string) => boolean;
}

export interface EvidenceVocabulary {
  rules: readonly EvidenceRule[];
  fallback: { type: string; rank: number };
}

export interface EvidenceClassification {
  evidenceType: string;
  qualityRank: number;
}

function containsAny(...cues: string[]): (text: string) => boolean {
  return (text) => cues.some((cue) => text.includes(cue));
}

// Lower rank = stronger evidence. Rules are tried in order.
const BIRTH_VOCABULARY: EvidenceVocabulary = {
  rules: [
    { type: 'explicit-field', rank: 0, matches: containsAny('date of birth', 'place and date of birth') },
    { type: 'narrative-mention', rank: 1, matches: containsAny('born', 'née', 'né ', ' b. ') },
    {
      type: 'categorical-mention',
      rank: 3,
      matches: (t) => t.includes(' births') || (t.includes('births') && t.includes('category')),
    },
  ],
  fallback: { type: 'other', rank: 2 },
};

const LIFE_STATUS_VOCABULARY: EvidenceVocabulary = {
  rules: [
    { type: 'obituary', rank: 0, matches: containsAny('obituary', 'memorial') },
    { type: 'death-narrative', rank: 1, matches: containsAny('died', 'death', ' d. ') },
    { type: 'alive-current', rank: 1, matches: containsAny('current', 'serves as', 'is the') },
  ],
  fallback: { type: 'other', rank: 2 },
};

const NATIONALITY_VOCABULARY: EvidenceVocabulary = {
  rules: [
    { type: 'explicit-field', rank: 0, matches: containsAny('nationality', 'citizenship', 'citizen of') },
  ],
  fallback: { type: 'other', rank: 2 },
};

export const EVIDENCE_VOCABULARIES: Record<Attribute, EvidenceVocabulary> = {
  [Attribute.BirthYear]: BIRTH_VOCABULARY,
  [Attribute.LifeStatus]: LIFE_STATUS_VOCABULARY,
  [Attribute.Nationality]: NATIONALITY_VOCABULARY,
};

export function classifyEvidence(
  vocabulary: EvidenceVocabulary,
  text: string
): EvidenceClassification {
  const lowered = text.toLowerCase();
  const rule = vocabulary.rules.find((r) => r.matches(lowered));
  if (rule) {
    return { evidenceType: rule.type, qualityRank: rule.rank };
  }
  return { evidenceType: vocabulary.fallback.type, qualityRank: vocabulary.fallback.rank };
}

const NEWS_HINTS = ['bbc.', 'reuters.', 'apnews.', 'nytimes.', 'guardian.', 'france24.', 'cnn.', 'aljazeera.', 'ft.com'];
const BLOG_HINTS = ['wordpress.', 'blogspot.', 'substack.', 'medium.'];

/*
 * Coarse publisher category of a normalized domain. Reported with each
 * evidence record; never used for counting or tie-breaking.
 */
export function authorityBucket(domain: string): string {
  const d = domain.toLowerCase();
  if (!d) return 'other';
  if (d.includes('wikipedia.org')) return 'wiki';
  if (d.endsWith('.gov') || d.includes('.gov.') || d.includes('parliament') || d.includes('senate') || d.includes('gouv')) {
    return 'gov';
  }
  if (d.endsWith('.edu') || d.includes('.edu.') || d.includes('.ac.')) return 'edu';
  if (d.endsWith('.org') || d.includes('.org.')) return 'org';
  if (NEWS_HINTS.some((hint) => d.includes(hint))) return 'news';
  if (BLOG_HINTS.some((hint) => d.includes(hint))) return 'blog';
  return 'other';
}
