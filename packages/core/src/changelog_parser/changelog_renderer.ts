import type { ChangelogEntry } from './changelog_parser.types';

export function renderHeader(entry: ChangelogEntry): string {
  const { weekday, month, day, time, year } = entry.date;
  const when = time === null ? `${weekday} ${month} ${day} ${year}` : `${weekday} ${month} ${day} ${time} ${year}`;
  return `* ${when} ${entry.author}<${entry.email}> `;
}

/**
 * Body line: subject, decorations, markers, then `[ticket] {cve}` once enriched.
 * Absent references render as empty strings between the separating spaces.
 */
export function renderBody(entry: ChangelogEntry): string {
  const markers = entry.markers.map((marker) => ` ${marker}`).join('');
  let body = `- ${entry.subject}${entry.decorations}${markers}`;

  if (entry.references) {
    const ticket = entry.references.ticket ? `[${entry.references.ticket}]` : '';
    const cve = entry.references.cve ? `{${entry.references.cve}}` : '';
    body += ` ${ticket} ${cve}`;
  }

  return body;
}

export function renderEntry(entry: ChangelogEntry): string {
  return `${renderHeader(entry)}\n${renderBody(entry)}\n\n`;
}

/**
 * Renders entries back into the log format, one header/body/blank triple each.
 */
export function renderChangelog(entries: ChangelogEntry[]): string {
  return entries.map(renderEntry).join('');
}
