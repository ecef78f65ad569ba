import type { OutputFormatter } from './formatter.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export type { OutputFormatter } from './formatter.js';

export type OutputFormat = 'json' | 'md' | 'plain';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'md' || value === 'plain';
}

export function createFormatter(format: OutputFormat): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
      return new MarkdownFormatter();
    case 'plain':
      return new PlainFormatter();
  }
}
