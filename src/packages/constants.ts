/** Keeps the interpreter from buffering output so lines stream as they are written. */
export const UNBUFFERED_ENV: Readonly<Record<string, string>> = { PYTHONUNBUFFERED: "1" };

/** Runtimes at or below this version lack the SSL support the tool needs for secure transport. */
export const LAST_INSECURE_RUNTIME_VERSION = "2.5";

export const INSECURE_ARGUMENT = "--insecure";
