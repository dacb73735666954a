import { ConfigurationError, getErrorMessage } from "./errors.js";

export type TextSink = { write(text: string): unknown };

/**
 * Where printed paths end up. Written at once when stdout is not the
 * terminal; otherwise held until the screen closes so the next redraw
 * cannot paint over them.
 */
export class PathPrinter {
  private readonly held: string[] = [];

  constructor(
    private readonly out: TextSink,
    private readonly immediate: boolean,
  ) {}

  print(file: string) {
    if (this.immediate) this.out.write(file + "\n");
    else this.held.push(file);
  }

  flush() {
    if (!this.held.length) return;
    this.out.write(this.held.join("\n") + "\n");
    this.held.length = 0;
  }
}

// 0 normal quit, 1 crash, 2 bad command line or setup
export function exitStatus(err?: unknown): number {
  if (err === undefined) return 0;
  return err instanceof ConfigurationError ? 2 : 1;
}

export function errorLine(err: unknown): string {
  return `sortview: ${getErrorMessage(err)}\n`;
}
