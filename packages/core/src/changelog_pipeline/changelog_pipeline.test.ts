import {
  annotateEntries,
  cleanupEntries,
  enrichEntries,
  findReferences,
  isMergeEntry,
  sortEntries,
} from './changelog_pipeline';
import { parseChangelogLog, renderBody, renderChangelog } from '../changelog_parser';
import type { ChangelogEntry } from '../changelog_parser';

function entry(date: string, author: string, subject: string): string {
  return `* ${date} ${author}<${author.toLowerCase()}@example.com> \n- ${subject}\n\n`;
}

function parse(...chunks: string[]): ChangelogEntry[] {
  return parseChangelogLog(chunks.join('')).entries;
}

function single(subject: string): ChangelogEntry {
  const [first] = parse(entry('Wed Jan 5 10:00:00 2022', 'Dev', subject));
  if (!first) throw new Error('expected an entry');
  return first;
}

describe('annotateEntries', () => {
  it('WHEN a marker is given THE SYSTEM SHALL append it to every body line', () => {
    const entries = parse(
      entry('Wed Jan 5 10:00:00 2022', 'Ana', 'fix console size'),
      entry('Tue Jan 4 10:00:00 2022', 'Bo', 'bump libseccomp')
    );

    const annotated = annotateEntries(entries, 'RUNC');

    expect(annotated.map(renderBody)).toEqual(['- fix console size RUNC', '- bump libseccomp RUNC']);
    expect(entries.map(renderBody)).toEqual(['- fix console size', '- bump libseccomp']);
  });

  it('should keep entries of other sources unmarked once merged into one log', () => {
    const runc = annotateEntries(parse(entry('Wed Jan 5 10:00:00 2022', 'Ana', 'fix console size')), 'RUNC');
    const containerd = parse(entry('Thu Jan 6 10:00:00 2022', 'Cy', 'update shim'));

    const merged = sortEntries([...runc, ...containerd]);

    expect(merged.map((e) => e.markers)).toEqual([[], ['RUNC']]);
  });

  it('should leave entries unchanged for an empty marker', () => {
    const entries = parse(entry('Wed Jan 5 10:00:00 2022', 'Ana', 'fix'));

    expect(annotateEntries(entries, '')).toEqual(entries);
  });
});

describe('sortEntries', () => {
  it('WHEN entries come from several sources THE SYSTEM SHALL order them newest first', () => {
    const entries = parse(
      entry('Tue Jan 4 10:00:00 2022', 'A', 'oldest'),
      entry('Thu Jan 6 08:00:00 2022', 'B', 'newest'),
      entry('Wed Jan 5 23:59:59 2022', 'C', 'middle')
    );

    expect(sortEntries(entries).map((e) => e.subject)).toEqual(['newest', 'middle', 'oldest']);
  });

  it('should produce non-increasing timestamps', () => {
    const entries = parse(
      entry('Sat Jan 1 00:00:01 2022', 'A', 'a'),
      entry('Fri Dec 31 23:59:59 2021', 'B', 'b'),
      entry('Mon Mar 7 12:00:00 2022', 'C', 'c'),
      entry('Sat Jan 1 00:00:00 2022', 'D', 'd'),
      entry('Mon Feb 28 09:15:00 2022', 'E', 'e')
    );

    const timestamps = sortEntries(entries).map((e) => e.timestamp);

    for (let i = 1; i < timestamps.length; i++) {
      expect(timestamps[i - 1]).toBeGreaterThanOrEqual(timestamps[i] ?? Number.POSITIVE_INFINITY);
    }
  });

  it('should keep the input order of entries sharing a timestamp', () => {
    const entries = parse(
      entry('Wed Jan 5 10:00:00 2022', 'A', 'first'),
      entry('Tue Jan 4 10:00:00 2022', 'B', 'older'),
      entry('Wed Jan 5 10:00:00 2022', 'C', 'second'),
      entry('Wed Jan 5 10:00:00 2022', 'D', 'third')
    );

    expect(sortEntries(entries).map((e) => e.subject)).toEqual(['first', 'second', 'third', 'older']);
  });

  it('should not reorder its input array', () => {
    const entries = parse(entry('Tue Jan 4 10:00:00 2022', 'A', 'old'), entry('Wed Jan 5 10:00:00 2022', 'B', 'new'));

    sortEntries(entries);

    expect(entries.map((e) => e.subject)).toEqual(['old', 'new']);
  });
});

describe('cleanupEntries', () => {
  it('WHEN a merge entry sits between two entries THE SYSTEM SHALL keep only the neighbours without their times', () => {
    const entries = parse(
      entry('Thu Jan 6 10:00:00 2022', 'A', 'alpha'),
      entry("Wed Jan 5 10:00:00 2022", 'M', "Merge branch 'dev'"),
      entry('Tue Jan 4 10:00:00 2022', 'B', 'beta')
    );

    const result = cleanupEntries(entries);

    expect(renderChangelog(result.entries)).toBe(
      '* Thu Jan 6 2022 A<a@example.com> \n- alpha\n\n' +
      '* Tue Jan 4 2022 B<b@example.com> \n- beta\n\n'
    );
    expect(result.removed.map((e) => e.subject)).toEqual(["Merge branch 'dev'"]);
  });

  it('should remove only the merge entry when it is the first in the log', () => {
    const entries = parse(
      entry('Thu Jan 6 10:00:00 2022', 'M', 'Merge pull request #12 from dev/feature'),
      entry('Wed Jan 5 10:00:00 2022', 'A', 'alpha'),
      entry('Tue Jan 4 10:00:00 2022', 'B', 'beta')
    );

    expect(cleanupEntries(entries).entries.map((e) => e.subject)).toEqual(['alpha', 'beta']);
  });

  it('should remove only the merge entry when it is the last in the log', () => {
    const entries = parse(
      entry('Thu Jan 6 10:00:00 2022', 'A', 'alpha'),
      entry('Wed Jan 5 10:00:00 2022', 'B', 'beta'),
      entry('Tue Jan 4 10:00:00 2022', 'M', "Merge branch 'main'")
    );

    expect(cleanupEntries(entries).entries.map((e) => e.subject)).toEqual(['alpha', 'beta']);
  });

  it('should be a no-op on already cleaned entries', () => {
    const once = cleanupEntries(parse(
      entry('Thu Jan 6 10:00:00 2022', 'A', 'alpha'),
      entry('Wed Jan 5 10:00:00 2022', 'M', 'Merge tag v1.1.0'),
      entry('Tue Jan 4 10:00:00 2022', 'B', 'beta')
    )).entries;

    const twice = cleanupEntries(once);

    expect(twice.entries).toEqual(once);
    expect(twice.removed).toEqual([]);
  });

  it('should honour a custom merge prefix', () => {
    const entries = parse(
      entry('Thu Jan 6 10:00:00 2022', 'A', 'Squash dev into main'),
      entry('Wed Jan 5 10:00:00 2022', 'B', "Merge branch 'dev'")
    );

    expect(cleanupEntries(entries, { mergePrefix: 'Squash' }).entries.map((e) => e.author)).toEqual(['B']);
  });
});

describe('isMergeEntry', () => {
  it('should match subjects whose first word starts with the prefix', () => {
    expect(isMergeEntry(single("Merge branch 'dev'"))).toBe(true);
    expect(isMergeEntry(single('Merged upstream fixes'))).toBe(true);
    expect(isMergeEntry(single("Revert \"Merge branch 'dev'\""))).toBe(false);
    expect(isMergeEntry(single('merge lowercase'))).toBe(false);
  });
});

describe('findReferences', () => {
  it('WHEN the subject carries a ticket and a CVE THE SYSTEM SHALL find both', () => {
    expect(findReferences(single('fix bug TFS12345 CVE-2023-0001'))).toEqual({ ticket: 'TFS12345', cve: 'CVE-2023-0001' });
  });

  it('should take a leading ticket word whatever follows the prefix', () => {
    expect(findReferences(single('TFS-77 tidy docs')).ticket).toBe('TFS-77');
    expect(findReferences(single('EC881: fix leak')).ticket).toBe('EC881:');
  });

  it('should only take a ticket from the middle of the subject when digits follow the prefix', () => {
    expect(findReferences(single('see TFSX notes')).ticket).toBeNull();
    expect(findReferences(single('backport TFS42 to 1.6')).ticket).toBe('TFS42');
  });

  it('WHEN a word past the first starts with EC and a digit THE SYSTEM SHALL not read it as a ticket', () => {
    expect(findReferences(single('support EC2 instance metadata')).ticket).toBeNull();
    expect(findReferences(single('use ECDSA keys')).ticket).toBeNull();
  });

  it('should match inline tickets for the configured inline prefixes', () => {
    const references = findReferences(single('backport EC42 to 1.6'), {
      ticketPrefixes: ['TFS', 'EC'],
      inlineTicketPrefixes: ['TFS', 'EC'],
      cvePrefix: 'CVE-',
    });

    expect(references.ticket).toBe('EC42');
  });

  it('should keep the last CVE of the subject', () => {
    expect(findReferences(single('fix CVE-2022-1111 and CVE-2022-2222')).cve).toBe('CVE-2022-2222');
  });

  it('should use the configured prefixes', () => {
    const references = findReferences(single('JIRA-9 fix GHSA-xxxx-yyyy'), { ticketPrefixes: ['JIRA'], cvePrefix: 'GHSA-' });

    expect(references).toEqual({ ticket: 'JIRA-9', cve: 'GHSA-xxxx-yyyy' });
  });
});

describe('enrichEntries', () => {
  it('WHEN both references are present THE SYSTEM SHALL append them bracketed and braced', () => {
    const [enriched] = enrichEntries([single('fix bug TFS12345 CVE-2023-0001')]);
    if (!enriched) throw new Error('expected an entry');

    expect(`${renderBody(enriched)}\n`).toBe('- fix bug TFS12345 CVE-2023-0001 [TFS12345] {CVE-2023-0001}\n');
  });

  it('WHEN no reference is present THE SYSTEM SHALL still append the separating spaces', () => {
    const [enriched] = enrichEntries([single('tidy docs')]);
    if (!enriched) throw new Error('expected an entry');

    expect(`${renderBody(enriched)}\n`).toBe('- tidy docs  \n');
  });

  it('should read markers and decorations as part of the body', () => {
    const [parsed] = parseChangelogLog(
      '* Wed Jan 5 10:00:00 2022 A<a@example.com> \n- EC12 fix (tag: v1.1.1) RUNC\n\n',
      { markers: ['RUNC'] }
    ).entries;
    if (!parsed) throw new Error('expected an entry');

    const [enriched] = enrichEntries([parsed]);
    if (!enriched) throw new Error('expected an entry');

    expect(renderBody(enriched)).toBe('- EC12 fix (tag: v1.1.1) RUNC [EC12] ');
  });

  it('should keep the entry count after cleanup when there are no merges', () => {
    const entries = parse(
      entry('Thu Jan 6 10:00:00 2022', 'A', 'TFS1 alpha'),
      entry('Wed Jan 5 10:00:00 2022', 'B', 'beta CVE-2022-0001'),
      entry('Tue Jan 4 10:00:00 2022', 'C', 'gamma')
    );

    const enriched = enrichEntries(cleanupEntries(entries).entries);

    expect(enriched).toHaveLength(3);
    expect(parseChangelogLog(renderChangelog(enriched)).entries).toHaveLength(3);
  });
});
