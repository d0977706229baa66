/**
 * ChangelogParser - raw log text to typed entries
 *
 * Reads the output of `git log --format="* %cd %aN<%ae> %n- %s%d%n" --date=local`
 * (and the cleaned form of it, whose headers carry no time of day).
 *
 * A header line (`* ...`) immediately followed by a body line (`- ...`) forms
 * one entry. Blank lines are separators. A header without a body, or any
 * other line, is skipped and reported in `skipped`. A header whose date
 * cannot be read aborts parsing with ChangelogParseError.
 *
 * @module changelog_parser
 */

import { ChangelogParseError } from '../errors';
import type {
  ChangelogEntry,
  CommitDate,
  ParsedLog,
  ParseOptions,
  SkippedLine,
} from './changelog_parser.types';

export const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
export const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

// * <weekday> <month> <day> [<HH:MM:SS>] <year> <author><<email>>
const HEADER_PATTERN = /^\* (\S+) (\S+) (\d{1,2})(?: (\d{1,2}):(\d{2}):(\d{2}))? (\d{4}) (.*)<([^<>]*)> ?$/;

const REF = String.raw`(?:HEAD -> [^\s,()]+|tag: [^\s,()]+|[^\s,()]+)`;
const DECORATIONS_PATTERN = new RegExp(String.raw` \(${REF}(?:, ${REF})*\)$`);

function isHeaderLine(line: string): boolean {
  return line.startsWith('*');
}

function isBodyLine(line: string): boolean {
  return line.startsWith('-');
}

function parseDate(
  match: RegExpMatchArray,
  lineNumber: number,
  line: string
): { date: CommitDate; timestamp: number } {
  const [, weekday = '', month = '', dayText = '', hourText, minuteText, secondText, yearText = ''] = match;

  if (!WEEKDAYS.some((name) => name === weekday)) {
    throw new ChangelogParseError(`unknown weekday "${weekday}"`, lineNumber, line);
  }

  const monthIndex = MONTHS.findIndex((name) => name === month);
  if (monthIndex === -1) {
    throw new ChangelogParseError(`unknown month "${month}"`, lineNumber, line);
  }

  const day = Number(dayText);
  const year = Number(yearText);
  const hasTime = hourText !== undefined && minuteText !== undefined && secondText !== undefined;
  const hours = hasTime ? Number(hourText) : 0;
  const minutes = hasTime ? Number(minuteText) : 0;
  const seconds = hasTime ? Number(secondText) : 0;

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new ChangelogParseError(`invalid time "${hourText}:${minuteText}:${secondText}"`, lineNumber, line);
  }

  // Fields are read as UTC so the host time zone never changes the ordering
  const timestamp = Date.UTC(year, monthIndex, day, hours, minutes, seconds);
  if (new Date(timestamp).getUTCDate() !== day) {
    throw new ChangelogParseError(`invalid day "${month} ${day} ${year}"`, lineNumber, line);
  }

  return {
    date: {
      weekday,
      month,
      day,
      time: hasTime ? `${hourText}:${minuteText}:${secondText}` : null,
      year,
    },
    timestamp,
  };
}

/**
 * Splits a body line into subject, ref decorations and trailing markers.
 */
function parseBody(
  line: string,
  knownMarkers: string[]
): Pick<ChangelogEntry, 'subject' | 'decorations' | 'markers'> {
  let text = line.startsWith('- ') ? line.slice(2) : line.slice(1);
  const markers: string[] = [];

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const marker of knownMarkers) {
      if (marker && text.endsWith(` ${marker}`)) {
        markers.unshift(marker);
        text = text.slice(0, -(marker.length + 1));
        stripped = true;
        break;
      }
    }
  }

  const decorations = DECORATIONS_PATTERN.exec(text)?.[0] ?? '';
  const subject = decorations ? text.slice(0, -decorations.length) : text;

  return { subject, decorations, markers };
}

/**
 * Parses one header line
 *
 * @throws ChangelogParseError if the line is not a readable header
 */
export function parseHeader(
  line: string,
  lineNumber: number
): Pick<ChangelogEntry, 'date' | 'timestamp' | 'author' | 'email'> {
  const match = HEADER_PATTERN.exec(line);
  if (!match) {
    throw new ChangelogParseError('malformed header, expected "* <weekday> <month> <day> <time> <year> <author><<email>>"', lineNumber, line);
  }

  const { date, timestamp } = parseDate(match, lineNumber, line);

  return {
    date,
    timestamp,
    author: match[8] ?? '',
    email: match[9] ?? '',
  };
}

/**
 * Converts raw log text into changelog entries
 *
 * @param text - Log text (LF or CRLF line endings)
 * @param options - Markers to split off body lines
 * @returns Entries in input order plus the lines that formed no entry
 * @throws ChangelogParseError if a header's date cannot be read
 *
 * @example
 * parseChangelogLog('* Wed Jan 5 10:00:00 2022 Jane Doe<jane@example.com> \n- fix build\n\n').entries[0]?.subject
 * // => "fix build"
 */
export function parseChangelogLog(text: string, options: ParseOptions = {}): ParsedLog {
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  const knownMarkers = options.markers ?? [];
  const entries: ChangelogEntry[] = [];
  const skipped: SkippedLine[] = [];

  let index = 0;
  while (index < lines.length) {
    const line = lines[index] ?? '';
    const lineNumber = index + 1;

    if (line.trim() === '') {
      index += 1;
      continue;
    }

    if (!isHeaderLine(line)) {
      skipped.push({ lineNumber, line, reason: 'stray-line' });
      index += 1;
      continue;
    }

    const header = parseHeader(line, lineNumber);
    const next = lines[index + 1];

    if (next === undefined || !isBodyLine(next)) {
      skipped.push({ lineNumber, line, reason: 'orphan-header' });
      index += 1;
      continue;
    }

    entries.push({
      ...header,
      ...parseBody(next, knownMarkers),
      references: null,
    });
    index += 2;
  }

  return { entries, skipped };
}
