import type { RiskIndicatorCategory } from '@claimaudit/shared';
import { AUDIT_CATEGORIES } from './claim-prompt.js';

interface RiskIndicator {
  category: RiskIndicatorCategory;
  weight: number;
  pattern: RegExp;
}

// Weights sum past 100 on purpose: several strong categories saturate the score.
export const RISK_INDICATORS: readonly RiskIndicator[] = [
  { category: 'fraud-language', weight: 25, pattern: /\b(?:fraud(?:ulent)?|suspicious|kickbacks?)\b/g },
  { category: 'upcoding', weight: 20, pattern: /\b(?:up-?cod(?:ing|ed)|down-?cod(?:ing|ed))\b/g },
  { category: 'unbundling', weight: 20, pattern: /\bunbundl(?:ing|ed)\b/g },
  { category: 'duplicate-billing', weight: 20, pattern: /\b(?:duplicate[sd]?|duplicat(?:ion|ive)|billed twice|double[- ]bill(?:ing|ed))\b/g },
  { category: 'specialty-mismatch', weight: 15, pattern: /\b(?:mismatch(?:es|ed)?|outside (?:of )?the (?:provider's |provider’s )?specialty)\b/g },
  { category: 'unusual-charges', weight: 15, pattern: /\b(?:unusual(?:ly)?|excessive(?:ly)?|inflated|overcharg(?:e|es|ed|ing))\b/g },
  { category: 'medical-necessity', weight: 15, pattern: /\b(?:not medically necessary|medically unnecessary|unnecessary|overutilization|over-utilization)\b/g },
  { category: 'documentation-gap', weight: 10, pattern: /\b(?:(?:lack of|insufficient|missing|inadequate) documentation|documentation gaps?|undocumented)\b/g },
  { category: 'inconsistency', weight: 10, pattern: /\b(?:inconsisten(?:t|cy|cies)|discrepanc(?:y|ies))\b/g },
];

export const MAX_FRAUD_SCORE = 100;

// A cue this close before a phrase, in the same sentence, negates it:
// "no evidence of upcoding", "without any duplicate charges".
const NEGATION_CUE = /\b(?:no|not|none|nothing|without|absence of|free of|never)\b(?:\s+\S+){0,3}\s*$/;
const SENTENCE_BREAK = /[.!?\n;]/g;

// Echoed section headings ("5. Fraud risk indicators:", "**Recommendations**")
// name what to look for, not a finding.
const SECTION_HEADING = new RegExp(
  `^[ \\t>#*_-]*(?:\\d+[.)])?[ \\t*_]*(?:${AUDIT_CATEGORIES.map((c) => c.toLowerCase()).join('|')})[ \\t*_]*(?::[ \\t*_]*|$)`,
  'gm',
);

function maskSectionHeadings(text: string): string {
  return text.replace(SECTION_HEADING, (heading) => ' '.repeat(heading.length));
}

function sentencePrefix(text: string, index: number): string {
  const before = text.slice(0, index);
  let start = 0;
  for (const match of before.matchAll(SENTENCE_BREAK)) {
    start = (match.index ?? 0) + 1;
  }
  return before.slice(start);
}

function hasAffirmedMatch(text: string, pattern: RegExp): boolean {
  for (const match of text.matchAll(pattern)) {
    const prefix = sentencePrefix(text, match.index ?? 0);
    if (!NEGATION_CUE.test(prefix)) return true;
  }
  return false;
}

/** Categories with at least one occurrence in the text that is not negated. */
export function findRiskIndicators(analysisText: string): RiskIndicatorCategory[] {
  const text = maskSectionHeadings(analysisText.toLowerCase());
  return RISK_INDICATORS.filter((indicator) => hasAffirmedMatch(text, indicator.pattern)).map(
    (indicator) => indicator.category,
  );
}

/**
 * Heuristic 0–100 fraud score: the summed weights of the distinct risk
 * categories the analysis mentions, capped at 100. Clean text scores 0.
 */
export function scoreAnalysis(analysisText: string): number {
  const matched = new Set(findRiskIndicators(analysisText));
  let score = 0;
  for (const indicator of RISK_INDICATORS) {
    if (matched.has(indicator.category)) score += indicator.weight;
  }
  return Math.min(score, MAX_FRAUD_SCORE);
}
