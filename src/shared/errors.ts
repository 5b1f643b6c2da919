export enum PackageToolErrorCode {
  NOT_RUNNABLE = "NOT_RUNNABLE",
  OPERATION_CANCELED = "OPERATION_CANCELED",
  SPAWN_FAILED = "SPAWN_FAILED",
  CONFIG_INVALID = "CONFIG_INVALID",
  INTERPRETER_NOT_FOUND = "INTERPRETER_NOT_FOUND",
}

export class PackageToolError extends Error {
  readonly code: PackageToolErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PackageToolErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "PackageToolError";
    this.code = code;
    this.context = context;
  }
}

export function isPackageToolError(err: unknown, code?: PackageToolErrorCode): err is PackageToolError {
  return err instanceof PackageToolError && (code === undefined || err.code === code);
}

/** True for a declined confirmation or an aborted signal. */
export function isOperationCanceled(err: unknown): err is PackageToolError {
  return isPackageToolError(err, PackageToolErrorCode.OPERATION_CANCELED);
}

export function operationCanceled(message = "Operation was canceled"): PackageToolError {
  return new PackageToolError(PackageToolErrorCode.OPERATION_CANCELED, message);
}
