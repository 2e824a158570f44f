const DISABLE_STACKTRACE : boolean = true;

export class EnvelopeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class InvalidArgumentError   extends EnvelopeError {}
export class MalformedEnvelopeError extends EnvelopeError {}
export class DecodingError          extends EnvelopeError {}
export class EncodingError          extends EnvelopeError {}
export class KeyDerivationError     extends EnvelopeError {}
export class EncryptionError        extends EnvelopeError {}
export class DecryptionError        extends EnvelopeError {}
export class FilesystemError        extends EnvelopeError {}
