/**
 * Destination for the human-readable upload summary
 */
export interface ReportSink {
  writeLine(line: string): void;
  writeSeparator(title: string): void;
}

export function formatSeparator(title: string, width = 80): string {
  const side = Math.max(3, Math.floor((width - title.length - 2) / 2));
  const line = `${'='.repeat(side)} ${title} ${'='.repeat(side)}`;
  return line.length < width ? `${line}=` : line;
}

export const consoleSink: ReportSink = {
  writeLine: (line) => console.log(line),
  writeSeparator: (title) => console.log(formatSeparator(title)),
};

/**
 * Keeps the summary in memory, for callers that print it themselves
 */
export class BufferedSink implements ReportSink {
  readonly lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }

  writeSeparator(title: string): void {
    this.lines.push(formatSeparator(title));
  }

  toString(): string {
    return this.lines.join('\n');
  }
}
