export type ArchiveErrorKind =
  | "ArchiveUnavailable"
  | "IncompleteChannel"
  | "ExternalToolFailure"
  | "UnknownChannelToken"
  | "NetworkUnreachable"
  | "DeviceHealthCheckFailure"
  | "StaleLivenessRecord";

export class ArchiveError extends Error {
  constructor(
    public readonly kind: ArchiveErrorKind,
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ArchiveError";
  }
}

export class ExternalToolError extends ArchiveError {
  constructor(
    message: string,
    public readonly code: number | null,
    context?: Record<string, unknown>,
  ) {
    super("ExternalToolFailure", message, { ...context, code });
    this.name = "ExternalToolError";
  }
}

export class MinuteNameParseError extends Error {
  constructor(
    public readonly fileName: string,
    reason: string,
  ) {
    super(`invalid minute file name '${fileName}': ${reason}`);
    this.name = "MinuteNameParseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
