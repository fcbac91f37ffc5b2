/** Largest length or count a CompactSize field may carry (32 MiB). */
export const MAX_SIZE = 0x02000000;

/**
 * Policy values the embedding system supplies to the codecs.
 * They are not part of the wire format itself.
 */
export interface CodecLimits {
  /** Ceiling for every CompactSize value, on encode and on decode. */
  maxSize?: number;
  /**
   * Reject boolean and presence bytes other than 0 and 1.
   * When false, any nonzero byte reads as true.
   */
  strictBooleans?: boolean;
}

export type ResolvedLimits = Required<CodecLimits>;

export const DEFAULT_LIMITS: ResolvedLimits = Object.freeze({
  maxSize: MAX_SIZE,
  strictBooleans: true,
});

/** Merge caller-supplied limits over the defaults. */
export function resolveLimits(limits?: CodecLimits): ResolvedLimits {
  const maxSize = limits?.maxSize ?? DEFAULT_LIMITS.maxSize;
  if (!Number.isSafeInteger(maxSize) || maxSize < 0) {
    throw new RangeError(`maxSize must be a non-negative safe integer, got ${maxSize}`);
  }
  return {
    maxSize,
    strictBooleans: limits?.strictBooleans ?? DEFAULT_LIMITS.strictBooleans,
  };
}
