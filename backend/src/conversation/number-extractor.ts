import { Injectable, Logger } from '@nestjs/common';

export interface ExtractedNumbers {
  groupSize: number | null;
  cottageNumber: string | null;
  isCapacityQuery: boolean;
}

const MIN_GROUP = 1;
const MAX_GROUP = 50;
const MIN_COTTAGE = 1;
const MAX_COTTAGE = 20;

// A number followed by a duration, a month name, an ordinal suffix or a date separator is not a head count.
const NOT_A_HEADCOUNT =
  '(?!\\d|\\s*(?:nights?|days?|weeks?|months?|jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)|st\\b|nd\\b|rd\\b|th\\b|[/.-]\\d)';

const GROUP_PATTERNS: RegExp[] = [
  /(?:we\s+are|group\s+of|party\s+of)\s+(\d+)\s+(?:guests?|members?|people|persons?)\b/g,
  /(\d+)\s*(?:members?|people|guests?|persons?)\b/g,
  /we\s+are\s+family\s+of\s+(\d+)/g,
  new RegExp(`(?:we\\s+are|group\\s+of|party\\s+of|with)\\s+(\\d+)${NOT_A_HEADCOUNT}`, 'g'),
  new RegExp(`group\\s+(\\d+)${NOT_A_HEADCOUNT}`, 'g'),
  /family\s+of\s+(\d+)/g,
  new RegExp(`\\bfor\\s+(\\d+)${NOT_A_HEADCOUNT}`, 'g'),
  /(\d+)\s+of\s+us\b/g,
  /we\s+are\s+(\d+)\s+(?:in\s+which|where|of\s+which)/g,
  /(\d+)\s+(?:in\s+which|of\s+which)\s+\d+/g,
  /we\s+are\s+a\s+(?:group|family)\s+of\s+(\d+)/g,
  /we\s+are\s+a\s+group\s+(\d+)/g,
];

const CAPACITY_WORDS = ['accommodate', 'fit', 'suit', 'capacity', 'stay', 'book'];

const COTTAGE_SPAN = /\bcottages?\s*(?:number|no\.?|#)?\s*(\d+)/g;
const COTTAGE_WINDOW = /\bcottages?\b((?:\s+[a-z#.]+){1,3})\s+(\d+)\b/;
// "cottages 9 and 11", "cottage 7, 9 or 11"
const LIST_CONTINUATION = /^\s*(?:,|&|\band\b|\bor\b)\s*(?:cottage\s*)?(\d+)\b/;
// Head-count words, room counts, durations and month names after a number rule it out as a cottage id.
const NOT_A_COTTAGE_SUFFIX =
  /^(?:\s*(?:people|persons?|guests?|members?|adults?|kids|children|of\s+us|nights?|days?|weeks?|bed(?:room)?s?|bathrooms?|rooms?)\b|\s*(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)|[/.-]\d)/;

const CAPACITY_PHRASES = [
  'will suit',
  'is suitable',
  'can accommodate',
  'can fit',
  'how many can',
  'good for',
  'right for',
  'enough for',
];

const STRICT_CAPACITY_KEYWORDS = [
  'suit',
  'suitable',
  'suitability',
  'accommodate',
  'accommodation',
  'fit',
  'fitting',
  'capacity',
  'group size',
  'how many can',
  'can we',
  'will it',
  'good for',
  'right for',
  'enough for',
  'best for',
];

const GENERAL_QUESTION = /tell me|what is|what are|describe|information about/;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const hasWord = (text: string, word: string) =>
  new RegExp(`\\b${escapeRegExp(word)}\\b`).test(text);

interface Span {
  start: number;
  end: number;
}

interface CottageMention extends Span {
  digits: string;
}

@Injectable()
export class NumberExtractor {
  private readonly logger = new Logger(NumberExtractor.name);

  extractAll(text: string): ExtractedNumbers {
    return {
      groupSize: this.extractGroupSize(text),
      cottageNumber: this.extractCottageNumber(text),
      isCapacityQuery: this.isCapacityQuery(text),
    };
  }

  /** Head count from "N people", "we are N", "group of N" and similar phrasing. */
  extractGroupSize(text: string): number | null {
    const normalized = text.toLowerCase();
    const cottageSpans = this.cottageSpans(normalized);

    for (const pattern of GROUP_PATTERNS) {
      const size = this.firstGroupMatch(normalized, pattern, cottageSpans);
      if (size !== null) {
        return size;
      }
    }

    for (const word of CAPACITY_WORDS) {
      const before = new RegExp(`(\\d+)\\s+${word}`, 'g');
      const after = new RegExp(`${word}\\s+(\\d+)${NOT_A_HEADCOUNT}`, 'g');
      const size =
        this.firstGroupMatch(normalized, before, cottageSpans) ??
        this.firstGroupMatch(normalized, after, cottageSpans);
      if (size !== null) {
        return size;
      }
    }

    return null;
  }

  /**
   * Cottage identifier, only when the word "cottage" precedes the number closely
   * and the number is not itself followed by a head-count word.
   */
  extractCottageNumber(text: string): string | null {
    const normalized = text.toLowerCase();

    for (const match of normalized.matchAll(COTTAGE_SPAN)) {
      const candidate = this.boundedCottage(match[1]);
      if (candidate && !this.followedByGroupWord(normalized, match)) {
        return candidate;
      }
    }

    const windowed = COTTAGE_WINDOW.exec(normalized);
    if (windowed && !this.followedByGroupWord(normalized, windowed)) {
      const candidate = this.boundedCottage(windowed[2]);
      if (candidate) {
        this.logger.debug(`Cottage ${candidate} resolved from nearby text`);
        return candidate;
      }
    }

    return null;
  }

  /** Every cottage named, in order, including lists such as "cottages 9 and 11". */
  extractCottageNumbers(text: string): string[] {
    const found: string[] = [];
    for (const mention of this.cottageMentions(text.toLowerCase())) {
      const candidate = this.boundedCottage(mention.digits);
      if (candidate && !found.includes(candidate)) {
        found.push(candidate);
      }
    }
    return found;
  }

  isCapacityQuery(text: string): boolean {
    const normalized = text.toLowerCase();

    if (CAPACITY_PHRASES.some((phrase) => normalized.includes(phrase))) {
      return true;
    }
    if (normalized.includes('which cottage') || normalized.includes('what cottage')) {
      return true;
    }
    if (STRICT_CAPACITY_KEYWORDS.some((keyword) => hasWord(normalized, keyword))) {
      return true;
    }

    if (GENERAL_QUESTION.test(normalized)) {
      return (
        /\d+\s+(?:people|person|guests?|members?|group)/.test(normalized) ||
        /(?:we are|group of|party of|family of|group)\s+(?:a\s+)?\d+/.test(normalized)
      );
    }

    const loose = ['members', 'people', 'guests', 'person', 'group', 'party', 'stay', 'book'];
    if (loose.some((keyword) => hasWord(normalized, keyword))) {
      return /\d/.test(normalized) || /how many|\bcan\b|\bwill\b/.test(normalized);
    }

    return false;
  }

  private firstGroupMatch(text: string, pattern: RegExp, cottageSpans: Span[]): number | null {
    for (const match of text.matchAll(pattern)) {
      const digits = match[1];
      const index = match.index;
      if (digits === undefined || index === undefined) {
        continue;
      }

      const numberStart = index + match[0].indexOf(digits);
      if (cottageSpans.some((span) => numberStart >= span.start && numberStart < span.end)) {
        this.logger.debug(`Skipping ${digits}: it names a cottage, not a group size`);
        continue;
      }

      const size = Number.parseInt(digits, 10);
      if (size >= MIN_GROUP && size <= MAX_GROUP) {
        return size;
      }
    }

    return null;
  }

  private cottageSpans(text: string): Span[] {
    return this.cottageMentions(text);
  }

  private cottageMentions(text: string): CottageMention[] {
    const mentions: CottageMention[] = [];
    for (const match of text.matchAll(COTTAGE_SPAN)) {
      if (match.index === undefined) {
        continue;
      }
      const end = match.index + match[0].length;
      mentions.push({ digits: match[1], start: match.index, end }, ...this.listedAfter(text, end));
    }
    return mentions;
  }

  private listedAfter(text: string, from: number): CottageMention[] {
    const listed: CottageMention[] = [];
    let cursor = from;
    for (;;) {
      const next = LIST_CONTINUATION.exec(text.slice(cursor));
      if (!next) {
        return listed;
      }
      const end = cursor + next[0].length;
      if (NOT_A_COTTAGE_SUFFIX.test(text.slice(end))) {
        return listed;
      }
      listed.push({ digits: next[1], start: end - next[1].length, end });
      cursor = end;
    }
  }

  private followedByGroupWord(text: string, match: RegExpMatchArray | RegExpExecArray): boolean {
    if (match.index === undefined) {
      return false;
    }
    return NOT_A_COTTAGE_SUFFIX.test(text.slice(match.index + match[0].length));
  }

  private boundedCottage(digits: string | undefined): string | null {
    if (digits === undefined) {
      return null;
    }
    const value = Number.parseInt(digits, 10);
    return value >= MIN_COTTAGE && value <= MAX_COTTAGE ? String(value) : null;
  }
}
