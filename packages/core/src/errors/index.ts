const DISABLE_STACKTRACE : boolean = true;

export class SliceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** Source cannot be positioned at the requested offset (or is not seekable at all) */
export class SeekError          extends SliceError {}
export class UnknownFormatError extends SliceError {}
export class IOError            extends SliceError {}
export class ArgumentError      extends SliceError {}

/** Wrap anything that is not already one of ours as an IOError */
export function asIOError(err: unknown, context: string): SliceError {
  if (err instanceof SliceError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new IOError(`${context}: ${msg}`, { cause: err });
}
