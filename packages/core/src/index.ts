// packages/core/src/index.ts

import type { CryptoProvider }  from './providers/CryptoProvider.js';
import {
  BLOCK_SIZE,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_DIFFICULTIES,
  DEFAULT_KEY_SIZE,
  type Difficulty,
} from './config/defaults.js';
import { decodeHeader }         from './header/decoder.js';
import type { KeyDerivation, KeySize, Secret } from './types/index.js';
import { base64Encode, base64Decode } from './util/bytes.js';
import { StreamProcessor }      from './stream/StreamProcessor.js';
import { IvEmbeddingCodec }     from './codec/IvEmbeddingCodec.js';
import { PasswordCodec }        from './codec/PasswordCodec.js';
import { Argon2KDF }            from './algorithms/kdf/Argon2.js';
import { Iso10126Padding }      from './algorithms/padding/iso10126.js';
import {
  ByteReader,
  WriterSink,
  memorySink,
  sourceFromBytes,
  type ByteSink,
} from './util/stream.js';
import { assertChunkSize, assertKeySize } from './util/validate.js';

import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';

import {
  EnvelopeError,
  EncryptionError,
  DecryptionError,
  InvalidArgumentError,
} from './errors/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring an AesEnvelope instance.
 */
export interface AesEnvelopeOptions {
  /** Password → key derivation; defaults to Argon2id tuned by `difficulty` */
  kdf?        : KeyDerivation;
  /** Argon2id preset used when no `kdf` is given; must match between encrypt and decrypt */
  difficulty? : Difficulty;
  /** Default AES key size (16 | 24 | 32) for the password form; defaults to 32 */
  keySize?    : KeySize;
  /** Bytes read from the source per step; defaults to one cipher block (16) */
  chunkSize?  : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?    : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?     : (msg: string) => void;
}

/** Metadata of a password envelope, read without decrypting. */
export interface EnvelopeInfo {
  keySize          : KeySize;
  saltLength       : number;
  salt             : string;
  saltBytes        : Uint8Array;
  iv               : string;
  ivBytes          : Uint8Array;
  headerLength     : number;
  ciphertextLength : number;
}

interface Codecs {
  stream   : StreamProcessor;
  iv       : IvEmbeddingCodec;
  password : PasswordCodec;
}

type Source = ReadableStream<Uint8Array>;
type Sink   = WritableStream<Uint8Array>;
type Op     = 'encrypt' | 'decrypt';

/**
 * AesEnvelope encrypts and decrypts byte arrays, text and streams into
 * self-describing AES-CBC envelopes.
 *
 * Layers, outermost first:
 *   password  `int32_LE(salt_len) || salt || iv || ciphertext`
 *   key       `iv || ciphertext`
 *   raw       `ciphertext`
 *
 * The instance holds configuration only; every call builds its own cipher
 * state, so concurrent calls do not interfere.
 */
export class AesEnvelope {
  private kdf       : KeyDerivation;
  private keySize   : KeySize;
  private chunkSize : number;

  // diagnostics
  private readonly log : Logger;

  /**
   * Create a new AesEnvelope with the given randomness provider and options.
   * @param provider - CSPRNG used for IVs, salts and padding bytes
   * @param opt - KDF, key size, chunk size and logging options
   */
  constructor(
    private readonly provider: CryptoProvider,
    opt: AesEnvelopeOptions = {},
  ) {
    this.kdf       = opt.kdf ?? new Argon2KDF(DEFAULT_DIFFICULTIES[opt.difficulty ?? 'middle']);
    this.keySize   = opt.keySize ?? DEFAULT_KEY_SIZE;
    this.chunkSize = assertChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    assertKeySize(this.keySize);

    this.log = createLogger(opt.verbose ?? 0, opt.logger);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Check whether the input parses as a password envelope with a
   * block-aligned ciphertext.
   * @param input - Base64 string or raw envelope bytes
   */
  static isEncrypted(input: string | Uint8Array): boolean {
    try {
      const info = AesEnvelope.decodeHeader(input);
      return info.ciphertextLength > 0 && info.ciphertextLength % BLOCK_SIZE === 0;
    } catch {
      return false;
    }
  }

  /**
   * Decode the header of a password envelope.
   * @param input - Base64 string or envelope bytes (at least the header)
   * @param totalLength - Full envelope length when `input` is only its head
   * @throws MalformedEnvelopeError or DecodingError on invalid input
   */
  static decodeHeader(input: string | Uint8Array, totalLength?: number): EnvelopeInfo {
    const buf = typeof input === 'string' ? base64Decode(input) : input;
    const h   = decodeHeader(buf);
    const len = totalLength ?? buf.length;
    return {
      keySize          : h.keySize,
      saltLength       : h.salt.byteLength,
      salt             : base64Encode(h.salt),
      saltBytes        : h.salt,
      iv               : base64Encode(h.iv),
      ivBytes          : h.iv,
      headerLength     : h.headerLen,
      ciphertextLength : Math.max(0, len - h.headerLen),
    };
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Setters / getters for run-time flexibility
  // ════════════════════════════════════════════════════════════════════════

  /** Set the default key size of the password form. */
  setKeySize(n: number): void {
    assertKeySize(n);
    this.keySize = n;
  }
  /** Get the default key size of the password form. */
  getKeySize(): KeySize                     { return this.keySize; }

  /** Replace the key derivation used by the password form. */
  setKdf(kdf: KeyDerivation): void          { this.kdf = kdf; }
  getKdf(): KeyDerivation                   { return this.kdf; }

  /**
   * Configure how many bytes each streaming step reads.
   * @param bytes - Positive integer ≤ 128 MiB
   */
  setChunkSize(bytes: number): number {
    this.chunkSize = assertChunkSize(bytes);
    return this.chunkSize;
  }
  /** Retrieve the current streaming chunk size. */
  getChunkSize(): number                    { return this.chunkSize; }

  /**
   * Adjust verbosity level of internal logger at runtime.
   * @param level - Logger verbosity (0-4)
   */
  setVerbose(level: Verbosity): void        { this.log.level = level; }
  /** Get the current logger verbosity setting. */
  getVerbose(): Verbosity                   { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  Password form
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Encrypt bytes with a password. Salt and IV are embedded in the result.
   * @param keySize - 16, 24 or 32; defaults to the instance key size
   * @throws InvalidArgumentError on an unsupported key size
   */
  async encryptWithPassword(
    plain: Uint8Array,
    pass: string,
    keySize: number = this.keySize,
  ): Promise<Uint8Array> {
    return this.viaStreams(plain, (src, dst) =>
      this.encryptStreamWithPassword(src, dst, pass, keySize));
  }

  /** Decrypt bytes produced by {@link encryptWithPassword}. */
  async decryptWithPassword(envelope: Uint8Array, pass: string): Promise<Uint8Array> {
    return this.viaStreams(envelope, (src, dst) =>
      this.decryptStreamWithPassword(src, dst, pass));
  }

  /**
   * Encrypt UTF-8 text with a password.
   * @returns Base64 of the password envelope
   */
  async encryptText(plain: string, pass: string, keySize: number = this.keySize): Promise<string> {
    const envelope = await this.encryptWithPassword(new TextEncoder().encode(plain), pass, keySize);
    return base64Encode(envelope);
  }

  /**
   * Decrypt Base64 produced by {@link encryptText}.
   * @throws DecodingError when the input is not Base64
   */
  async decryptText(envelopeB64: string, pass: string): Promise<string> {
    this.log.log(3, 'Decoding Base64 envelope');
    const plain = await this.decryptWithPassword(base64Decode(envelopeB64.trim()), pass);
    return new TextDecoder().decode(plain);
  }

  /**
   * Read plaintext from `src`, write the password envelope to `dst`.
   * Neither stream is closed.
   */
  async encryptStreamWithPassword(
    src: Source,
    dst: Sink,
    pass: string,
    keySize: number = this.keySize,
  ): Promise<void> {
    const secret = this.secretOf(pass, 'encrypt');
    this.log.log(1, `Start password encryption, AES-${keySize * 8}`);
    await this.run('encrypt', src, dst, (reader, sink, codecs) =>
      codecs.password.encrypt(reader, sink, secret, keySize));
    this.log.log(1, 'Encryption finished');
  }

  /** Read a password envelope from `src`, write plaintext to `dst`. */
  async decryptStreamWithPassword(src: Source, dst: Sink, pass: string): Promise<void> {
    const secret = this.secretOf(pass, 'decrypt');
    this.log.log(1, 'Start password decryption');
    await this.run('decrypt', src, dst, (reader, sink, codecs) =>
      codecs.password.decrypt(reader, sink, secret));
    this.log.log(1, 'Decryption finished');
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Key form (embedded IV)
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Encrypt bytes with a raw key; a fresh IV is embedded in the result.
   * @param key - 16, 24 or 32 bytes
   * @throws InvalidArgumentError on a bad key length
   */
  async encryptWithKey(plain: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
    return this.viaStreams(plain, (src, dst) => this.encryptStreamWithKey(src, dst, key));
  }

  /** Decrypt bytes produced by {@link encryptWithKey}. */
  async decryptWithKey(envelope: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
    return this.viaStreams(envelope, (src, dst) => this.decryptStreamWithKey(src, dst, key));
  }

  async encryptStreamWithKey(src: Source, dst: Sink, key: Uint8Array): Promise<void> {
    this.log.log(1, `Start key encryption, AES-${key.length * 8}`);
    await this.run('encrypt', src, dst, (reader, sink, codecs) =>
      codecs.iv.encrypt(reader, sink, key));
  }

  async decryptStreamWithKey(src: Source, dst: Sink, key: Uint8Array): Promise<void> {
    this.log.log(1, `Start key decryption, AES-${key.length * 8}`);
    await this.run('decrypt', src, dst, (reader, sink, codecs) =>
      codecs.iv.decrypt(reader, sink, key));
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Raw form (caller supplies key and IV; output carries neither)
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Encrypt bytes with a caller-chosen key and IV. Never reuse an IV with the
   * same key; prefer {@link encryptWithKey}.
   * @throws InvalidArgumentError on a bad key or IV length
   */
  async encrypt(plain: Uint8Array, key: Uint8Array, iv: Uint8Array): Promise<Uint8Array> {
    return this.viaStreams(plain, (src, dst) => this.encryptStream(src, dst, key, iv));
  }

  async decrypt(cipher: Uint8Array, key: Uint8Array, iv: Uint8Array): Promise<Uint8Array> {
    return this.viaStreams(cipher, (src, dst) => this.decryptStream(src, dst, key, iv));
  }

  async encryptStream(src: Source, dst: Sink, key: Uint8Array, iv: Uint8Array): Promise<void> {
    await this.run('encrypt', src, dst, (reader, sink, codecs) =>
      codecs.stream.encrypt(reader, sink, key, iv));
  }

  async decryptStream(src: Source, dst: Sink, key: Uint8Array, iv: Uint8Array): Promise<void> {
    await this.run('decrypt', src, dst, (reader, sink, codecs) =>
      codecs.stream.decrypt(reader, sink, key, iv));
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Helpers
  // ════════════════════════════════════════════════════════════════════════

  /** Codec chain for one call: password → iv → stream. */
  private codecs(): Codecs {
    const stream   = new StreamProcessor(this.provider, this.chunkSize, new Iso10126Padding(), this.log);
    const iv       = new IvEmbeddingCodec(this.provider, stream);
    const password = new PasswordCodec(this.provider, this.kdf, iv, this.log);
    return { stream, iv, password };
  }

  /**
   * Lock `src` and `dst` for the duration of `fn`, release both on every exit
   * path, and map unexpected failures onto the operation's error type.
   */
  private async run(
    op  : Op,
    src : Source,
    dst : Sink,
    fn  : (reader: ByteReader, sink: ByteSink, codecs: Codecs) => Promise<void>,
  ): Promise<void> {
    try {
      const reader = new ByteReader(src);
      try {
        const sink = new WriterSink(dst);
        try {
          await fn(reader, sink, this.codecs());
        } finally {
          sink.release();
        }
      } finally {
        reader.release();
      }
    } catch (err) {
      if (err instanceof EnvelopeError) {
        this.log.log(2, `${op} failed: ${err.name}: ${err.message}`);
        throw err;
      }
      const msg = err instanceof Error ? err.message : String(err);
      throw op === 'encrypt'
        ? new EncryptionError(msg, { cause: err })
        : new DecryptionError(msg, { cause: err });
    }
  }

  /**
   * Byte-array adapter: fresh in-memory source over a copy of `data`, fresh
   * in-memory destination, result concatenated into a new array.
   */
  private async viaStreams(
    data: Uint8Array,
    action: (src: Source, dst: Sink) => Promise<void>,
  ): Promise<Uint8Array> {
    const out = memorySink();
    await action(sourceFromBytes(data), out.stream);
    return out.bytes();
  }

  private secretOf(pass: string, op: Op): Secret {
    if (typeof pass !== 'string') {
      throw new InvalidArgumentError('Password must be a string');
    }
    if (pass === '') this.log.log(0, `Empty passphrase provided to ${op}`);
    return { value: pass };
  }
}

export {
  EnvelopeError,
  InvalidArgumentError,
  MalformedEnvelopeError,
  DecodingError,
  EncodingError,
  KeyDerivationError,
  EncryptionError,
  DecryptionError,
  FilesystemError,
} from './errors/index.js';
export { Argon2KDF } from './algorithms/kdf/Argon2.js';
export { DEFAULT_DIFFICULTIES, type Difficulty } from './config/defaults.js';
export type { CryptoProvider } from './providers/CryptoProvider.js';
export type { KeyDerivation, DerivedKey, KeySize, Secret } from './types/index.js';
export type { Verbosity, Logger } from './util/logger.js';
