/**
 * Read-only description of a Python installation.
 * Owned by the caller; operations only read it.
 */
export interface InterpreterConfiguration {
  readonly id: string;
  /** Installation root; the package tool's scripts live beneath it. */
  readonly prefixPath: string;
  /** Standard library directory; holds site-packages. */
  readonly libraryPath: string;
  readonly interpreterPath: string;
  /** Dotted runtime version, e.g. "3.11". */
  readonly version: string;
}
