/**
 * Line-oriented destination for operation progress.
 * Operations never query display state; they only call these.
 */
export interface OutputSink {
  writeLine(text: string): void;
  writeErrorLine(text: string): void;
  /** Make the output visible without taking focus. */
  show(): void;
  /** Make the output visible and bring it to the foreground. */
  showAndActivate(): void;
}
