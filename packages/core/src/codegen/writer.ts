/**
 * Code Writer
 * Line-oriented output buffer with indentation.
 */

export class CodeWriter {
  private readonly out: string[] = [];
  private level = 0;
  private indentation = '';

  constructor(private readonly indentSpaces = 2) {}

  /** Ends the current line, if any, and writes the indentation */
  beginLine(): void {
    this.endLine();
    this.out.push(this.indentation);
  }

  write(text: string): void {
    if (text !== '') this.out.push(text);
  }

  line(text: string): void {
    this.beginLine();
    this.write(text);
  }

  blankLine(): void {
    this.endLine();
    this.out.push('\n');
  }

  private endLine(): void {
    const last = this.out[this.out.length - 1];
    if (last !== undefined && !last.endsWith('\n')) this.out.push('\n');
  }

  indent(): void {
    this.level++;
    this.indentation = ' '.repeat(this.indentSpaces * this.level);
  }

  dedent(): void {
    if (this.level === 0) throw new RangeError('dedent below level 0');
    this.level--;
    this.indentation = ' '.repeat(this.indentSpaces * this.level);
  }

  /** Output so far, ending in a newline */
  toString(): string {
    const text = this.out.join('');
    return text === '' || text.endsWith('\n') ? text : `${text}\n`;
  }
}
