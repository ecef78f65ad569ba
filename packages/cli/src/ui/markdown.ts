import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

marked.use(markedTerminal());

/** Markdown rendered for the terminal, without the trailing blank lines marked-terminal adds. */
export function renderMarkdown(text: string): string {
  return (marked(text) as string).trimEnd();
}
