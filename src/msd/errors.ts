// ─── Conversion Errors ──────────────────────────────────────────────────────
//
// The only failures the converter reports. Truncated packets and events
// are not errors: the pass simply stops early (see ConversionReport).
// ─────────────────────────────────────────────────────────────────────────────

export const ERROR_KINDS = ["InvalidFormat", "AllocationFailure", "BufferTooSmall"] as const;
export type MsdErrorKind = (typeof ERROR_KINDS)[number];

export class MsdConvertError extends Error {
  readonly kind: MsdErrorKind;
  /** Bytes the output needs. Set for BufferTooSmall only. */
  readonly requiredSize?: number;

  constructor(kind: MsdErrorKind, message: string, options?: { requiredSize?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MsdConvertError";
    this.kind = kind;
    this.requiredSize = options?.requiredSize;
  }
}

/** Narrow an unknown throw to a converter error of the given kind. */
export function isMsdError(err: unknown, kind?: MsdErrorKind): err is MsdConvertError {
  return err instanceof MsdConvertError && (kind === undefined || err.kind === kind);
}
