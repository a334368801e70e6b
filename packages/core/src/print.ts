/**
 * Output sinks for print().
 *
 * `write` receives one formatted argument at a time; separators and the
 * line terminator arrive through `push`.
 */
export interface PrintWriter {
  write(text: string): void;
  push(ch: string): void;
}

/** Writes to process.stdout. */
export class StdPrint implements PrintWriter {
  write(text: string): void {
    process.stdout.write(text);
  }

  push(ch: string): void {
    process.stdout.write(ch);
  }
}

/** Accumulates output in memory. */
export class CollectStringPrint implements PrintWriter {
  private buf = "";

  write(text: string): void {
    this.buf += text;
  }

  push(ch: string): void {
    this.buf += ch;
  }

  get output(): string {
    return this.buf;
  }
}

/** Discards everything. */
export class NoPrint implements PrintWriter {
  write(): void {}

  push(): void {}
}
