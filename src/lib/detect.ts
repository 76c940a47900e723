import { InvalidQueryError } from './errors';
import { normalizeText, round2, tokenize } from './text';
import type { Language, LanguageDetectionResult, ScriptRatios } from './types';

type CountedScript = keyof ScriptRatios;

// Listed in tie-break priority order.
const SCRIPT_RANGES: ReadonlyArray<{ script: CountedScript; ranges: ReadonlyArray<[number, number]> }> = [
  { script: 'devanagari', ranges: [[0x0900, 0x097f], [0xa8e0, 0xa8ff]] },
  { script: 'telugu', ranges: [[0x0c00, 0x0c7f]] },
  { script: 'latin', ranges: [[0x41, 0x5a], [0x61, 0x7a], [0xc0, 0x24f]] },
];

const HINDI_MARKERS = markerSet([
  'है', 'हैं', 'और', 'का', 'की', 'के', 'में', 'से', 'को', 'नहीं', 'क्या', 'कैसे', 'कब', 'कहाँ', 'क्यों',
  'करें', 'करना', 'लिए', 'बनाएं', 'होता', 'था', 'यह', 'वह', 'आप', 'मुझे',
]);

const MARATHI_MARKERS = markerSet([
  'आहे', 'आहेत', 'आणि', 'कसे', 'कशी', 'कसा', 'कधी', 'कुठे', 'का', 'नाही', 'मध्ये', 'साठी', 'च्या', 'ची', 'चा',
  'करावे', 'करावी', 'कोणत्या', 'मला', 'तुम्ही', 'हे', 'ते', 'पाहिजे', 'सांगा',
]);

const ENGLISH_MARKERS = markerSet([
  'the', 'is', 'are', 'and', 'of', 'to', 'in', 'how', 'what', 'when', 'where', 'why', 'for', 'a', 'do', 'i',
]);

// ळ is rare in Hindi and frequent in Marathi.
const MARATHI_LETTER = /ळ/;

function markerSet(words: string[]): ReadonlySet<string> {
  return new Set(words.map(normalizeText));
}

function scriptOf(codePoint: number): CountedScript | null {
  for (const { script, ranges } of SCRIPT_RANGES) {
    if (ranges.some(([lo, hi]) => codePoint >= lo && codePoint <= hi)) return script;
  }
  return null;
}

function countScripts(text: string): ScriptRatios {
  const counts: ScriptRatios = { devanagari: 0, telugu: 0, latin: 0 };
  for (const ch of text) {
    const script = scriptOf(ch.codePointAt(0) ?? 0);
    if (script) counts[script] += 1;
  }
  return counts;
}

function dominantScript(counts: ScriptRatios): CountedScript | null {
  let best: CountedScript | null = null;
  for (const { script } of SCRIPT_RANGES) {
    if (counts[script] > 0 && (best === null || counts[script] > counts[best])) best = script;
  }
  return best;
}

/**
 * Hindi and Marathi share Devanagari, so they are told apart by function
 * words. Ties (including no evidence at all) go to Hindi.
 */
function resolveDevanagari(tokens: string[]): { language: Language; certainty: number } {
  let hindi = 0;
  let marathi = 0;
  for (const token of tokens) {
    if (HINDI_MARKERS.has(token)) hindi += 1;
    if (MARATHI_MARKERS.has(token)) marathi += 1;
    if (MARATHI_LETTER.test(token)) marathi += 1;
  }
  if (hindi + marathi === 0) return { language: 'hindi', certainty: 0.6 };
  const language: Language = marathi > hindi ? 'marathi' : 'hindi';
  return { language, certainty: 0.6 + (0.4 * Math.abs(hindi - marathi)) / (hindi + marathi) };
}

function englishCertainty(tokens: string[]): number {
  const hits = tokens.filter((t) => ENGLISH_MARKERS.has(t)).length;
  return 0.7 + 0.3 * Math.min(hits / 3, 1);
}

function resolveLanguage(script: CountedScript, tokens: string[]): { language: Language; certainty: number } {
  switch (script) {
    case 'devanagari':
      return resolveDevanagari(tokens);
    case 'telugu':
      return { language: 'telugu', certainty: 1 };
    case 'latin':
      return { language: 'english', certainty: englishCertainty(tokens) };
  }
}

export function detectLanguage(rawText: string): LanguageDetectionResult {
  if (!rawText.trim()) throw new InvalidQueryError();

  const counts = countScripts(rawText);
  const total = counts.devanagari + counts.telugu + counts.latin;
  const primary = dominantScript(counts);

  if (primary === null || total === 0) {
    return {
      detectedLanguage: 'english',
      primaryScript: 'unknown',
      confidence: 0,
      scriptRatios: { devanagari: 0, telugu: 0, latin: 0 },
    };
  }

  const scriptRatios: ScriptRatios = {
    devanagari: round2(counts.devanagari / total),
    telugu: round2(counts.telugu / total),
    latin: round2(counts.latin / total),
  };
  const ratio = counts[primary] / total;
  const tokens = tokenize(rawText);

  const { language, certainty } = resolveLanguage(primary, tokens);

  return {
    detectedLanguage: language,
    primaryScript: primary,
    confidence: round2(ratio * certainty),
    scriptRatios,
  };
}
