export class SduiError extends Error {
  code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SduiError";
    this.code = code;
  }
}

export class DecodeError extends SduiError {
  kind: string;
  field?: string;

  constructor(kind: string, message: string, field?: string, code = "DECODE_ERROR") {
    super(field ? `${kind}.${field}: ${message}` : `${kind}: ${message}`, code);
    this.name = "DecodeError";
    this.kind = kind;
    this.field = field;
  }
}

export class UnknownComponentKindError extends DecodeError {
  constructor(tag: string) {
    super(tag, "unknown component kind", undefined, "UNKNOWN_COMPONENT_KIND");
    this.name = "UnknownComponentKindError";
  }
}

export class SectionDecodeError extends SduiError {
  sectionId: string;
  decodeError: DecodeError;

  constructor(sectionId: string, decodeError: DecodeError) {
    super(`Section ${sectionId}: ${decodeError.message}`, decodeError.code, {
      cause: decodeError,
    });
    this.name = "SectionDecodeError";
    this.sectionId = sectionId;
    this.decodeError = decodeError;
  }
}

export type ResolutionErrorKind = "storage" | "decode" | "invalid_key";

export class ResolutionError extends SduiError {
  kind: ResolutionErrorKind;
  entrypointKey: string;

  constructor(
    kind: ResolutionErrorKind,
    entrypointKey: string,
    message: string,
    code: string,
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
    this.name = "ResolutionError";
    this.kind = kind;
    this.entrypointKey = entrypointKey;
  }
}

export class InvalidEntrypointKeyError extends ResolutionError {
  constructor(entrypointKey: string) {
    super("invalid_key", entrypointKey, "Entrypoint key must not be empty", "INVALID_ENTRYPOINT_KEY");
    this.name = "InvalidEntrypointKeyError";
  }
}

export class StorageResolutionError extends ResolutionError {
  constructor(entrypointKey: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      "storage",
      entrypointKey,
      `Unable to load sections for entrypoint "${entrypointKey}": ${reason}`,
      "STORAGE_UNAVAILABLE",
      { cause }
    );
    this.name = "StorageResolutionError";
  }
}

export class DecodeResolutionError extends ResolutionError {
  sectionError: SectionDecodeError;

  constructor(entrypointKey: string, sectionError: SectionDecodeError) {
    super(
      "decode",
      entrypointKey,
      `Entrypoint "${entrypointKey}" contains an invalid section: ${sectionError.message}`,
      "SECTION_DECODE_FAILED",
      { cause: sectionError }
    );
    this.name = "DecodeResolutionError";
    this.sectionError = sectionError;
  }
}
