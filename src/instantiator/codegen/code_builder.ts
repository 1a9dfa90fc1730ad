/**
 * Line-oriented text accumulator with scope indentation
 */

export class CodeBuilder {
  private readonly lines: string[] = [];
  private indentLevel = 0;

  constructor(private readonly indentUnit = "    ") {}

  get indent(): number {
    return this.indentLevel;
  }

  writeLine(text = ""): void {
    this.lines.push(
      text.length > 0 ? `${this.indentUnit.repeat(this.indentLevel)}${text}` : "",
    );
  }

  /**
   * Writes a `//` comment line per line of text. Blank text writes nothing.
   */
  writeComment(text: string | undefined): void {
    if (!text || text.trim().length === 0) {
      return;
    }
    for (const line of text.split(/\r?\n/)) {
      this.writeLine(`// ${line}`.trimEnd());
    }
  }

  openScope(): void {
    this.writeLine("{");
    this.indentLevel++;
  }

  closeScope(suffix = ""): void {
    if (this.indentLevel === 0) {
      throw new Error("closeScope called without a matching openScope");
    }
    this.indentLevel--;
    this.writeLine(`}${suffix}`);
  }

  toString(): string {
    return `${this.lines.join("\n")}\n`;
  }
}
