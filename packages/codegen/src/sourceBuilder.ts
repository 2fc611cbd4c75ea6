interface SourceLine {
  depth: number;
  text: string;
}

/**
 * Append-only accumulator for emitted statements. Lines are never reordered;
 * callers emit in final order.
 */
export class SourceBuilder {
  private readonly lines: SourceLine[] = [];
  private currentDepth = 0;

  constructor(private readonly indentUnit = "  ") {}

  get depth(): number {
    return this.currentDepth;
  }

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  statement(text: string): this {
    this.lines.push({ depth: this.currentDepth, text });
    return this;
  }

  openBlock(header: string): this {
    this.statement(`${header} {`);
    this.currentDepth += 1;
    return this;
  }

  closeBlock(suffix = ""): this {
    this.currentDepth = Math.max(0, this.currentDepth - 1);
    this.statement(`}${suffix}`);
    return this;
  }

  blankLine(): this {
    const last = this.lines[this.lines.length - 1];
    if (!last || last.text.length === 0) return this;
    this.lines.push({ depth: 0, text: "" });
    return this;
  }

  /** Copies another builder's lines, nested under the current depth. */
  append(other: SourceBuilder): this {
    for (const line of other.lines) {
      if (line.text.length === 0) {
        this.blankLine();
        continue;
      }
      this.lines.push({ depth: this.currentDepth + line.depth, text: line.text });
    }
    return this;
  }

  toString(): string {
    const rendered = this.lines.map((line) =>
      line.text.length === 0 ? "" : `${this.indentUnit.repeat(line.depth)}${line.text}`,
    );
    return `${rendered.join("\n")}\n`;
  }
}
