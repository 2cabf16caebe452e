/**
 * XMLTV Channel Parser
 *
 * Streams an XMLTV document through a strict SAX parser and collects the
 * channel entries (top-level <channel> elements). Programme data is not
 * read.
 */

import type { Readable } from 'node:stream';
import sax, { type QualifiedTag, type Tag } from 'sax';
import { UNKNOWN_GUIDE_LANGUAGE, type GuideEntry } from '@/types';
import { ParseError } from '@/lib/errors';

export interface GuideParseResult {
  entries: GuideEntry[];
  /** Channel elements with neither id nor display-name */
  skipped: number;
}

interface ChannelState {
  id: string;
  displayName: string | null;
  /** Text buffer of the first display-name while it is open */
  buffer: string | null;
}

function attributeValue(tag: Tag | QualifiedTag, name: string): string {
  const value = tag.attributes[name];
  if (value === undefined) return '';
  return typeof value === 'string' ? value : value.value;
}

/**
 * Parse the channel entries of an XMLTV stream.
 * Malformed XML, including a document without a root element, rejects
 * with a ParseError; stream failures reject as-is.
 */
export function parseGuideChannels(stream: Readable, sourceUrl: string): Promise<GuideParseResult> {
  return new Promise((resolve, reject) => {
    const entries: GuideEntry[] = [];
    let skipped = 0;
    let settled = false;

    const parser = sax.createStream(true, { trim: false });

    // Root element is depth 1, so channels open at depth 2
    let depth = 0;
    let sawRoot = false;
    let channel: ChannelState | null = null;

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      stream.unpipe(parser);
      stream.destroy();
      reject(error);
    };

    parser.on('opentag', (node) => {
      depth++;
      sawRoot = true;

      if (depth === 2 && node.name === 'channel') {
        channel = { id: attributeValue(node, 'id').trim(), displayName: null, buffer: null };
      } else if (
        depth === 3 &&
        channel &&
        node.name === 'display-name' &&
        channel.displayName === null
      ) {
        channel.buffer = '';
      }
    });

    parser.on('text', (text) => {
      if (channel && channel.buffer !== null) channel.buffer += text;
    });

    parser.on('cdata', (cdata) => {
      if (channel && channel.buffer !== null) channel.buffer += cdata;
    });

    parser.on('closetag', (name) => {
      if (channel && depth === 3 && name === 'display-name' && channel.buffer !== null) {
        channel.displayName = channel.buffer.trim();
        channel.buffer = null;
      } else if (channel && depth === 2) {
        const displayName = channel.displayName ?? '';
        if (channel.id || displayName) {
          entries.push({
            id: channel.id,
            displayName,
            sourceGuideUrl: sourceUrl,
            language: UNKNOWN_GUIDE_LANGUAGE,
          });
        } else {
          skipped++;
        }
        channel = null;
      }

      depth--;
    });

    parser.on('error', (error) => {
      fail(new ParseError(sourceUrl, error.message.replace(/\n/g, ', '), { cause: error }));
    });

    parser.on('end', () => {
      if (settled) return;
      // Strict sax ends an empty or whitespace-only input without an error
      if (!sawRoot) {
        fail(new ParseError(sourceUrl, 'document has no root element'));
        return;
      }
      settled = true;
      resolve({ entries, skipped });
    });

    stream.on('error', fail);

    stream.pipe(parser);
  });
}
