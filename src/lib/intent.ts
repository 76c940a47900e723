// Intent classification: deterministic and explainable, never let a model pick the label.
import { round2, tokenize } from './text';
import type { CulturalCategory, CulturalMatch, IntentClassification, IntentLabel } from './types';

export const BASELINE_CONFIDENCE = 0.5;
const CUE_WEIGHT = 0.5;

type VotingIntent = Exclude<IntentLabel, 'general_response'>;

const CATEGORY_INTENT: Partial<Record<CulturalCategory, VotingIntent>> = {
  health: 'healthcare_advice',
  festival: 'cultural_guide',
  tradition: 'cultural_guide',
};

// Remedy/treatment words across the supported languages.
const HEALTH_CUES: ReadonlySet<string> = new Set([
  'इलाज', 'नुस्खा', 'नुस्खे', 'दवा', 'उपचार', 'औषध',
  'చికిత్స', 'ఔషధం', 'మందు', 'నివారణ',
  'remedy', 'remedies', 'treatment', 'cure', 'medicine',
]);

interface Tally {
  votes: number;
  best: number;
  firstIndex: number;
}

export function classifyIntent(rawText: string, matches: readonly CulturalMatch[]): IntentClassification {
  const tallies = new Map<VotingIntent, Tally>();
  const signals: string[] = [];
  let allVotes = 0;

  matches.forEach((match, i) => {
    allVotes += match.confidence;
    const intent = CATEGORY_INTENT[match.category];
    if (!intent) return;
    const tally = tallies.get(intent) ?? { votes: 0, best: 0, firstIndex: i };
    tally.votes += match.confidence;
    tally.best = Math.max(tally.best, match.confidence);
    tallies.set(intent, tally);
    signals.push(`${match.category}:${match.id}`);
  });

  const cues = tokenize(rawText).filter((token) => HEALTH_CUES.has(token));
  if (cues.length > 0) {
    const tally = tallies.get('healthcare_advice') ?? { votes: 0, best: 0, firstIndex: Number.MAX_SAFE_INTEGER };
    tally.votes += CUE_WEIGHT;
    tallies.set('healthcare_advice', tally);
    allVotes += CUE_WEIGHT;
    signals.push(`cue:${cues[0]}`);
  }

  if (tallies.size === 0) {
    return { label: 'general_response', confidence: BASELINE_CONFIDENCE, signals: ['no-cultural-signal'] };
  }

  // Most votes wins; a tie goes to the intent holding the strongest match,
  // then to whichever match came first.
  const [label, winner] = [...tallies.entries()].sort(
    ([, a], [, b]) => b.votes - a.votes || b.best - a.best || a.firstIndex - b.firstIndex
  )[0];

  return {
    label,
    confidence: round2(0.55 + (0.4 * winner.votes) / allVotes),
    signals,
  };
}
