export type WriteText = (text: string) => void;

/**
 * Keeps streamed terminal output in step with the response text. Deltas are
 * written as they arrive; a snapshot or final text that extends what is on
 * screen writes only the missing tail, and one that disagrees is printed again
 * on a fresh line.
 */
export class StreamedTextPrinter {
  private printed = "";

  constructor(private readonly write: WriteText) {}

  printedText(): string {
    return this.printed;
  }

  append(text: string): void {
    if (!text) {
      return;
    }
    this.printed += text;
    this.write(text);
  }

  sync(text: string): void {
    if (text === this.printed) {
      return;
    }
    if (text.startsWith(this.printed)) {
      this.append(text.slice(this.printed.length));
      return;
    }
    this.printed = text;
    this.write(`\n${text}`);
  }
}
