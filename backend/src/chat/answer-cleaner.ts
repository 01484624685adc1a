import { Injectable, Logger } from '@nestjs/common';

export interface CleaningRule {
  name: string;
  matches(text: string): boolean;
  apply(text: string): string;
}

const REASONING_PREFIXES: RegExp[] = [
  /^[ \t]*(?:refined\s+)?answer:[ \t]*/im,
  /however, there seems to be missing context[^\n]*?\.\s*/i,
  /since the original context is now provided[^\n]*?\.\s*/i,
  /since the question and the answer already match[^\n]*?\.\s*/i,
  /therefore, i'll leave the answer as it is\.\s*/i,
  /based on the (?:provided context|existing answer and the new context|context information provided above)[^.,\n]*[.,]\s*/i,
  /given the (?:new )?context[^.,\n]*[.,]\s*/i,
  /we have the opportunity to refine[^\n]*?\.\s*/i,
  /to refine the existing answer[^\n]*?\.\s*/i,
];

const META_PHRASES = [
  'the new context is',
  'since the original',
  'however, there seems',
  'to refine the existing',
  'we have the opportunity',
  'considering the',
];

const CODE_FENCE = /```[\s\S]*?```/;

const MARKER_LINE =
  /^[ \t]*(?:END OF ANSWER TEXT|DETAILED ANALYSIS \(context only\):|DETAILED BREAKDOWN:|STRUCTURED (?:PRICING|CAPACITY) [A-Z0-9 ]+(?:\([^)\n]*\))?:)[ \t]*$/m;

const DIRECT_ANSWER_PREFIX = /^[ \t]*DIRECT ANSWER[^:\n]*:[ \t]*/m;

const everywhere = (pattern: RegExp) =>
  new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);

const isMetaLine = (line: string) => {
  const lower = line.trim().toLowerCase();
  return META_PHRASES.some((phrase) => lower.startsWith(phrase));
};

export const reasoningPrefixes: CleaningRule = {
  name: 'reasoning-prefixes',
  matches: (text) => REASONING_PREFIXES.some((pattern) => pattern.test(text)),
  apply: (text) => REASONING_PREFIXES.reduce((current, pattern) => current.replace(everywhere(pattern), ''), text),
};

export const codeFences: CleaningRule = {
  name: 'code-fences',
  matches: (text) => CODE_FENCE.test(text),
  apply: (text) => text.replace(everywhere(CODE_FENCE), ''),
};

export const metaLines: CleaningRule = {
  name: 'meta-lines',
  matches: (text) => text.split('\n').some(isMetaLine),
  apply: (text) => {
    const kept: string[] = [];
    let skipping = false;
    for (const line of text.split('\n')) {
      if (isMetaLine(line)) {
        skipping = true;
        continue;
      }
      if (skipping && (line.trim() === '' || line.trim() === '---')) {
        continue;
      }
      skipping = false;
      kept.push(line);
    }
    return kept.join('\n');
  },
};

export const templateMarkers: CleaningRule = {
  name: 'template-markers',
  matches: (text) => MARKER_LINE.test(text) || DIRECT_ANSWER_PREFIX.test(text),
  apply: (text) =>
    text
      .replace(everywhere(MARKER_LINE), '')
      .replace(everywhere(DIRECT_ANSWER_PREFIX), ''),
};

export const blankLineCollapse: CleaningRule = {
  name: 'blank-line-collapse',
  matches: (text) => /\n{3,}/.test(text) || text !== text.trim(),
  apply: (text) => text.replace(/\n{3,}/g, '\n\n').trim(),
};

export const ANSWER_CLEANING_RULES: readonly CleaningRule[] = [
  reasoningPrefixes,
  codeFences,
  metaLines,
  templateMarkers,
  blankLineCollapse,
];

/** Strips model chatter and leaked template scaffolding from a generated answer. */
@Injectable()
export class AnswerCleaner {
  private readonly logger = new Logger(AnswerCleaner.name);

  clean(text: string, rules: readonly CleaningRule[] = ANSWER_CLEANING_RULES): string {
    const applied: string[] = [];
    const cleaned = rules.reduce((current, rule) => {
      if (!rule.matches(current)) {
        return current;
      }
      applied.push(rule.name);
      return rule.apply(current);
    }, text);

    if (applied.length > 0) {
      this.logger.debug(`Answer cleaned by ${applied.join(', ')}`);
    }
    return cleaned;
  }
}
