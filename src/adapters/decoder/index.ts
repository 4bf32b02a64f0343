/**
 * Message Decoder
 *
 * Raw RFC 822 source → sender, subject, plain-text body and date, via
 * mailparser. HTML-only messages are rendered to text with html-to-text.
 */

import { simpleParser } from 'mailparser';
import type { AddressObject } from 'mailparser';
import { convert, type HtmlToTextOptions } from 'html-to-text';
import type { MessageDecoder } from '../../core/ports';
import type { DecodedMessage } from '../../core/domain';

const HTML_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'a', options: { ignoreHref: true } },
    { selector: 'img', format: 'skip' },
    { selector: 'style', format: 'skip' },
    { selector: 'script', format: 'skip' },
  ],
};

/** Block structure survives as line breaks; runs of spaces, including &nbsp;, become one */
export function htmlToText(html: string): string {
  return convert(html, HTML_OPTIONS)
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function formatSender(from: AddressObject | AddressObject[] | undefined): string {
  const first = Array.isArray(from) ? from[0] : from;
  if (!first) return '';

  const address = first.value[0];
  if (address?.address) {
    return address.name ? `${address.name} <${address.address}>` : address.address;
  }
  return first.text || '';
}

export function createMessageDecoder(): MessageDecoder {
  return {
    async decode(source: Buffer): Promise<DecodedMessage> {
      const parsed = await simpleParser(source);
      const html = typeof parsed.html === 'string' ? parsed.html : '';

      return {
        sender: formatSender(parsed.from),
        subject: parsed.subject || '',
        body: parsed.text?.trim() || htmlToText(html),
        date: parsed.date ?? null,
      };
    },
  };
}
