import type {NumericToken} from 'src/types';

/**
 * Letters OCR engines commonly produce in place of digits
 */
export const DIGIT_SUBSTITUTIONS: Record<string, string> = {
  O: '0',
  o: '0',
  I: '1',
  l: '1',
  S: '5',
};

/**
 * Currency words in any case. Spelled out per letter since an `i` flag would
 * also widen the digit-like letters of the candidate pattern.
 */
const CURRENCY_WORD = '(?:[Ii][Nn][Rr]|[Uu][Ss][Dd]|[Ee][Uu][Rr]|[Gg][Bb][Pp]|[Rr][Ss])';

/**
 * Matches runs of digits and digit-like letters, optionally grouped by `,` or
 * `.`. The run may not touch a letter or digit, except for a currency word
 * written directly against it ("Rs1200", "usd45", "1200INR").
 */
const CANDIDATE_REGEX = new RegExp(
  `(?:(?<![\\p{L}\\p{N}])|(?<=(?<!\\p{L})${CURRENCY_WORD}))` +
    '[0-9OoIlS]+(?:[.,][0-9OoIlS]+)*' +
    `(?:(?![\\p{L}\\p{N}])|(?=${CURRENCY_WORD}(?!\\p{L})))`,
  'gu'
);

/**
 * Matches currency markers, words and symbols
 */
const CURRENCY_REGEX = /(?<!\p{L})(?:INR|USD|EUR|GBP|Rs\.?)(?!\p{L})|[$€£₹]/giu;

const CURRENCY_SYMBOLS: Record<string, string> = {
  $: 'USD',
  '€': 'EUR',
  '£': 'GBP',
  '₹': 'INR',
};

/**
 * Ends a segment of related text, e.g. one line of a bill or one cell of a
 * `|` separated row
 */
const SEGMENT_DELIMITERS = /[\n\r|;]/;

const CONTEXT_RADIUS = 24;

/**
 * Joins a number to a neighbouring one as part of a date, time or range
 */
const JOINERS = ['/', ':', '-'];

interface CurrencyMarker {
  code: string;
  start: number;
  end: number;
}

function isDigit(char: string | undefined) {
  return char !== undefined && char >= '0' && char <= '9';
}

function correctDigits(raw: string) {
  return raw.replace(/[OoIlS]/g, char => DIGIT_SUBSTITUTIONS[char] ?? char);
}

/**
 * Converts a corrected digit string with `,` / `.` separators into a number.
 * Returns null when the separators do not form a recognizable amount.
 */
export function parseAmount(digits: string): number | null {
  const lastComma = digits.lastIndexOf(',');
  const lastDot = digits.lastIndexOf('.');

  let plain: string | null;

  if (lastComma !== -1 && lastDot !== -1) {
    // Whichever separator comes last is the decimal point
    const [decimal, thousands] = lastComma > lastDot ? [',', '.'] : ['.', ','];
    const withoutThousands = digits.split(thousands).join('');
    plain =
      withoutThousands.split(decimal).length === 2
        ? withoutThousands.replace(decimal, '.')
        : null;
  } else if (lastComma !== -1) {
    const groups = digits.split(',');
    const last = groups[groups.length - 1];

    if (last.length === 3) {
      plain = groups.join('');
    } else if (groups.length === 2 && last.length <= 2) {
      plain = `${groups[0]}.${last}`;
    } else {
      plain = null;
    }
  } else if (lastDot !== -1) {
    const groups = digits.split('.');

    if (groups.length === 2) {
      plain = digits;
    } else if (groups.slice(1).every(group => group.length === 3)) {
      plain = groups.join('');
    } else {
      plain = null;
    }
  } else {
    plain = digits;
  }

  if (plain === null) {
    return null;
  }

  const value = Number(plain);

  // Longer digit runs are account or invoice numbers, and lose precision
  if (!Number.isFinite(value) || Math.trunc(value) > Number.MAX_SAFE_INTEGER) {
    return null;
  }

  return value;
}

/**
 * Finds the bounds of the segment of text surrounding `[start, end)`.
 */
export function segmentBounds(text: string, start: number, end: number) {
  let segmentStart = start;
  while (segmentStart > 0 && !SEGMENT_DELIMITERS.test(text[segmentStart - 1])) {
    segmentStart--;
  }

  let segmentEnd = end;
  while (segmentEnd < text.length && !SEGMENT_DELIMITERS.test(text[segmentEnd])) {
    segmentEnd++;
  }

  return {start: segmentStart, end: segmentEnd};
}

/**
 * Cuts the provenance snippet for the token at `[start, end)`. The snippet
 * stays inside the token's segment and is a verbatim substring of `text`.
 */
export function extractContext(text: string, start: number, end: number): string {
  const segment = segmentBounds(text, start, end);
  const from = Math.max(segment.start, start - CONTEXT_RADIUS);
  const to = Math.min(segment.end, end + CONTEXT_RADIUS);

  return text.slice(from, to).trim();
}

function currencyCode(marker: string) {
  return CURRENCY_SYMBOLS[marker] ?? marker.replace('.', '').toUpperCase();
}

function findCurrencyMarkers(text: string): CurrencyMarker[] {
  return [...text.matchAll(CURRENCY_REGEX)].map(match => ({
    code: currencyCode(match[0]),
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

/**
 * Finds a currency marker separated from the token only by spaces or
 * punctuation.
 */
function adjacentCurrency(
  text: string,
  markers: CurrencyMarker[],
  start: number,
  end: number
): string | null {
  const before = markers.find(
    marker => marker.end <= start && /^[\s:.\-]*$/.test(text.slice(marker.end, start))
  );
  if (before !== undefined) {
    return before.code;
  }

  const after = markers.find(
    marker => marker.start >= end && /^\s*$/.test(text.slice(end, marker.start))
  );

  return after?.code ?? null;
}

function isJoinedToNumber(text: string, start: number, end: number) {
  const joinedBefore = JOINERS.includes(text[start - 1]) && isDigit(text[start - 2]);
  const joinedAfter = JOINERS.includes(text[end]) && isDigit(text[end + 1]);

  return joinedBefore || joinedAfter;
}

/**
 * Extracts the numeric candidates of a document, correcting digits that the
 * OCR engine read as letters. Returns an empty list when nothing matches.
 */
export function extractTokens(text: string): NumericToken[] {
  const markers = findCurrencyMarkers(text);
  const tokens: NumericToken[] = [];

  for (const match of text.matchAll(CANDIDATE_REGEX)) {
    const raw = match[0];
    const start = match.index ?? 0;
    const end = start + raw.length;

    if (raw.length < 2 || !/\d/.test(raw)) {
      continue;
    }

    // Percentages are rates, not amounts
    if (/^\s?%/.test(text.slice(end, end + 2))) {
      continue;
    }

    if (isJoinedToNumber(text, start, end)) {
      continue;
    }

    const value = parseAmount(correctDigits(raw));
    if (value === null) {
      continue;
    }

    tokens.push({
      id: tokens.length,
      raw,
      value,
      index: start,
      currencyHint: adjacentCurrency(text, markers, start, end),
      context: extractContext(text, start, end),
    });
  }

  return tokens;
}

/**
 * Picks the document currency: the first marker written next to an amount,
 * otherwise the first marker anywhere in the text.
 */
export function detectCurrency(text: string, tokens: NumericToken[]): string | null {
  const hinted = tokens.find(token => token.currencyHint !== null);
  if (hinted !== undefined) {
    return hinted.currencyHint;
  }

  return findCurrencyMarkers(text)[0]?.code ?? null;
}
