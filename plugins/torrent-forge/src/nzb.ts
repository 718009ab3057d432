/**
 * Placeholder NZB documents for `.nzb` requests
 */

import { XMLBuilder } from 'fast-xml-parser';

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '    ',
});

const PROLOGUE =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<!DOCTYPE nzb PUBLIC "-//newzBin//DTD NZB 1.1//EN" "http://www.newzbin.com/DTD/nzb/nzb-1.1.dtd">\n';

export const NZB_CONTENT_TYPE = 'application/x-nzb';

export interface BuiltNzb {
  fileName: string;
  body: string;
}

/** "2024-05-01 12:00:00 UTC" */
export function formatNzbDate(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function buildPlaceholderNzb(name: string, now: Date = new Date()): BuiltNzb {
  const document = {
    nzb: {
      '@_xmlns': 'http://www.newzbin.com/DTD/2003/nzb',
      head: {
        meta: [
          { '@_type': 'title', '#text': name },
          { '@_type': 'date', '#text': formatNzbDate(now) },
        ],
      },
      file: {
        '@_poster': 'anonymous@example.com',
        '@_date': Math.floor(now.getTime() / 1000),
        '@_subject': `${name} (1/1)`,
        groups: { group: 'alt.binaries.test' },
        segments: {
          segment: [
            { '@_bytes': 512000, '@_number': 1, '#text': 'placeholder-segment-1' },
            { '@_bytes': 512000, '@_number': 2, '#text': 'placeholder-segment-2' },
          ],
        },
      },
    },
  };

  return {
    fileName: `${name}.nzb`,
    body: PROLOGUE + builder.build(document),
  };
}
