const DISABLE_STACKTRACE : boolean = true;

export class TapError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class InvalidNameError     extends TapError {}
export class SourceReadError      extends TapError {}
export class AddressOverflowError extends TapError {}
export class BlockTooLargeError   extends TapError {}
export class SinkWriteError       extends TapError {}
export class EncoderStateError    extends TapError {}
export class FilesystemError      extends TapError {}
