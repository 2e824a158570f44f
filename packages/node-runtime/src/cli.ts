// packages/node-runtime/src/cli.ts
import {
  Command,
  CommanderError,
  InvalidArgumentError as CliArgumentError,
  Option,
} from 'commander';
import { accessSync, constants as fsConstants, existsSync, realpathSync } from 'node:fs';
import { createReadStream, createWriteStream } from 'node:fs';
import { open, rm } from 'node:fs/promises';
import { dirname, isAbsolute, resolve, sep } from 'node:path';
import type { Readable, Writable } from 'node:stream';

import { AesEnvelope, type EnvelopeInfo } from '../../core/src/index.js';
import { IV_LENGTH, SALT_PREFIX_BYTES, type Difficulty } from '../../core/src/config/defaults.js';
import { FilesystemError, InvalidArgumentError } from '../../core/src/errors/index.js';
import type { KeySize } from '../../core/src/types/index.js';
import { base64Decode, isBase64 } from '../../core/src/util/bytes.js';
import { isVerbosity, type Verbosity } from '../../core/src/util/logger.js';
import { assertKey, isKeySize } from '../../core/src/util/validate.js';
import { createEnvelope } from './index.js';
import { toWebReadable, toWebWritable } from './streamAdapter.js';

const PKG_VERSION = '1.0.0'; // sync with root package.json

/** Largest password-envelope header: prefix + 32-byte salt + IV. */
const MAX_HEADER_BYTES = SALT_PREFIX_BYTES + 32 + IV_LENGTH;

const DEFAULT_CLI_CHUNK_SIZE = 64 * 1024;

/** Process endpoints, injectable so the CLI can run in-process. */
export interface CliIO {
  stdin  : Readable & { isTTY?: boolean; setRawMode?(mode: boolean): unknown };
  stdout : Writable;
  stderr : Writable;
  /** Output files must resolve inside this directory. */
  cwd    : string;
}

type GlobalOpts = {
  pass?      : string;
  key?       : string;
  keySize    : KeySize;
  difficulty : Difficulty;
  chunkSize  : number;
  verbose    : number;
};

interface OutOpts {
  out: string;
}

type Source = ReadableStream<Uint8Array>;
type Sink   = WritableStream<Uint8Array>;

export function processIo(): CliIO {
  return { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr, cwd: process.cwd() };
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function promptPass(io: CliIO): Promise<string> {
  const { stdin, stderr } = io;
  if (!stdin.isTTY) {
    return Promise.reject(new InvalidArgumentError('STDIN is not a TTY; use --pass'));
  }
  stderr.write('Passphrase: ');
  stdin.setRawMode?.(true);
  stdin.resume();
  stdin.setEncoding('utf8');

  let buf = '';
  return new Promise((resolvePass, reject) => {
    function finish() {
      stdin.setRawMode?.(false);
      stdin.pause();
      stderr.write('\n');
      stdin.off('data', onData);
    }
    function onData(ch: string) {
      if (ch === '\u0003') {
        finish();
        reject(new InvalidArgumentError('Passphrase entry aborted'));
        return;
      }
      if (ch === '\r' || ch === '\n') {
        finish();
        resolvePass(buf);
        return;
      }
      if (ch === '\u0008' || ch === '\u007F') {
        buf = buf.slice(0, -1);
        return;
      }
      buf += ch;
    }
    stdin.on('data', onData);
  });
}

/**
 * Resolve `out` against `root` and refuse anything that lands outside it.
 * @returns the absolute output path, or `undefined` for STDOUT
 */
export function assertWritable(out: string, root: string): string | undefined {
  if (out === '-') return undefined;

  const absRoot   = realpathSync(root);
  const absOut    = isAbsolute(out) ? resolve(out) : resolve(absRoot, out);
  const targetDir = dirname(absOut);

  if (!existsSync(targetDir)) {
    throw new FilesystemError(`Output directory does not exist: ${targetDir}`);
  }

  const realTarget = realpathSync(targetDir);
  if (realTarget !== absRoot && !realTarget.startsWith(absRoot + sep)) {
    throw new FilesystemError('Refusing to write outside of root directory.');
  }

  try {
    accessSync(targetDir, fsConstants.W_OK);
  } catch (err) {
    throw new FilesystemError('Output directory is not writeable', { cause: err });
  }

  return absOut;
}

async function readAll(stdin: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const c of stdin) {
    chunks.push(typeof c === 'string' ? Buffer.from(c, 'utf8') : Buffer.from(c));
  }
  return Buffer.concat(chunks);
}

function parseKey(b64: string): Uint8Array {
  const key = base64Decode(b64.trim());
  assertKey(key);
  return key;
}

async function passphrase(opts: GlobalOpts, io: CliIO): Promise<string> {
  return opts.pass ?? promptPass(io);
}

function envelopeFor(opts: GlobalOpts, io: CliIO): AesEnvelope {
  const verbose: Verbosity = isVerbosity(opts.verbose) ? opts.verbose : 4;
  return createEnvelope({
    difficulty : opts.difficulty,
    keySize    : opts.keySize,
    chunkSize  : opts.chunkSize,
    verbose,
    logger     : msg => { io.stderr.write(msg + '\n'); },
  });
}

/**
 * Run `action` from `src` (path or `-`) into `out` (path or `-`). Files are
 * opened and closed here; a failed run removes its partial output file.
 */
async function pipeFiles(
  src    : string,
  out    : string,
  io     : CliIO,
  action : (src: Source, dst: Sink) => Promise<void>,
): Promise<void> {
  if (src !== '-' && !existsSync(src)) {
    throw new FilesystemError(`Input file not found: ${src}`);
  }
  const target = assertWritable(out, io.cwd);

  const input  = src === '-' ? io.stdin : createReadStream(src);
  const output = target === undefined ? io.stdout : createWriteStream(target);
  const webIn  = toWebReadable(input);
  const webOut = toWebWritable(output);

  try {
    await action(webIn, webOut);
    if (target !== undefined) await webOut.close();
  } catch (err) {
    if (target !== undefined) {
      await webOut.abort(err);
      await rm(target, { force: true });
    }
    throw err;
  } finally {
    if (src !== '-') input.destroy();
  }
}

/** Leading header bytes and total size of a file, without reading it whole. */
async function fileHead(path: string): Promise<{ head: Uint8Array; size: number }> {
  const fh = await open(path, 'r');
  try {
    const { size } = await fh.stat();
    const head = new Uint8Array(Math.min(MAX_HEADER_BYTES, size));
    await fh.read(head, 0, head.length, 0);
    return { head, size };
  } finally {
    await fh.close();
  }
}

function printInfo(info: EnvelopeInfo, io: CliIO): void {
  const { keySize, saltLength, salt, iv, headerLength, ciphertextLength } = info;
  const meta = { keySize, saltLength, salt, iv, headerLength, ciphertextLength };
  io.stdout.write(JSON.stringify(meta, null, 2) + '\n');
}

function reportError(err: unknown, stderr: Writable): void {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
}

/* ------------------------------------------------------------------ */
/*  Program                                                            */
/* ------------------------------------------------------------------ */

export function buildProgram(io: CliIO = processIo()): Command {
  const program = new Command();

  program
    .name('aes-envelope')
    .version(PKG_VERSION)
    .description('Password and key based AES-CBC file and text encryption\n' +
      'Password form: int32 salt length | salt | IV | ciphertext (Argon2id)\n' +
      'Key form:      IV | ciphertext')
    .exitOverride()
    .configureOutput({
      writeOut: s => { io.stdout.write(s); },
      writeErr: s => { io.stderr.write(s); },
    })

    // passphrase
    .addOption(
      new Option('-p, --pass <passphrase>', 'passphrase (prompt if omitted)')
        .argParser((v) => {
          if (!v.trim()) throw new CliArgumentError('Passphrase cannot be empty');
          return v;
        })
    )

    // raw key instead of a passphrase
    .addOption(
      new Option('-k, --key <base64>', 'raw AES key (16, 24 or 32 bytes, Base64); selects the key form')
        .conflicts('pass')
    )

    // key size of the password form
    .addOption(
      new Option('--key-size <bytes>', 'AES key size for the password form')
        .argParser((v): KeySize => {
          const n = Number(v);
          if (!isKeySize(n)) throw new CliArgumentError('Key size must be 16, 24 or 32');
          return n;
        })
        .default(32, '32')
    )

    // difficulty
    .addOption(
      new Option('-d, --difficulty <level>', 'argon2 difficulty')
        .choices(['low', 'middle', 'high'] as const)
        .default('middle', 'middle')
    )

    // chunk-size
    .addOption(
      new Option('-c, --chunk-size <bytes>', 'bytes read per step')
        .argParser((v) => {
          const n = Number(v);
          if (!Number.isInteger(n) || n <= 0) {
            throw new CliArgumentError('Chunk size must be a positive integer');
          }
          return n;
        })
        .default(DEFAULT_CLI_CHUNK_SIZE, '64*1024')
    )

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1)
    );

  const globals = () => program.opts<GlobalOpts>();
  // text and header commands only know the password form
  const textGlobals = () => {
    const opts = globals();
    if (opts.key !== undefined) {
      throw new InvalidArgumentError('--key is not supported by text commands');
    }
    return opts;
  };

  program
    .command('encrypt <src>')
    .description('Encrypt file; use - for STDIN, --out - for STDOUT')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .action(async (src: string, cmd: OutOpts) => {
      const opts = globals();
      const env  = envelopeFor(opts, io);

      if (opts.key !== undefined) {
        const key = parseKey(opts.key);
        await pipeFiles(src, cmd.out, io, (rs, ws) => env.encryptStreamWithKey(rs, ws, key));
        return;
      }
      if (src === '-' && opts.pass === undefined) {
        throw new InvalidArgumentError('Use --pass when piping via STDIN');
      }
      const pass = await passphrase(opts, io);
      await pipeFiles(src, cmd.out, io, (rs, ws) =>
        env.encryptStreamWithPassword(rs, ws, pass, opts.keySize));
    });

  program
    .command('decrypt <src>')
    .description('Decrypt file; use - for STDIN, --out - for STDOUT')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .action(async (src: string, cmd: OutOpts) => {
      const opts = globals();
      const env  = envelopeFor(opts, io);

      if (opts.key !== undefined) {
        const key = parseKey(opts.key);
        await pipeFiles(src, cmd.out, io, (rs, ws) => env.decryptStreamWithKey(rs, ws, key));
        return;
      }
      const pass = await passphrase(opts, io);
      await pipeFiles(src, cmd.out, io, (rs, ws) => env.decryptStreamWithPassword(rs, ws, pass));
    });

  program
    .command('encrypt-text [text]')
    .description('Encrypt plaintext; omit arg to read from STDIN')
    .action(async (text?: string) => {
      const opts = textGlobals();
      const env  = envelopeFor(opts, io);
      if (text === undefined && opts.pass === undefined) {
        throw new InvalidArgumentError('Use --pass when piping via STDIN');
      }
      const pass   = await passphrase(opts, io);
      const plain  = text ?? (await readAll(io.stdin)).toString('utf8');
      const cipher = await env.encryptText(plain, pass, opts.keySize);
      io.stdout.write(cipher + '\n');
    });

  program
    .command('decrypt-text [b64]')
    .description('Decrypt Base64 ciphertext; omit arg to read from STDIN')
    .action(async (b64?: string) => {
      const opts = textGlobals();
      const env  = envelopeFor(opts, io);
      const pass = await passphrase(opts, io);
      const data = (b64 ?? (await readAll(io.stdin)).toString('utf8')).trim();
      const plain = await env.decryptText(data, pass);
      io.stdout.write(plain + '\n');
    });

  program
    .command('decode [src]')
    .description('Show password-envelope header information; file path, Base64 text, or omit / - for STDIN')
    .action(async (src?: string) => {
      textGlobals();

      /* file path: header bytes plus size, never the whole file */
      if (src !== undefined && src !== '-' && existsSync(src)) {
        const { head, size } = await fileHead(src);
        printInfo(AesEnvelope.decodeHeader(head, size), io);
        return;
      }

      /* literal argument: Base64 envelope */
      if (src !== undefined && src !== '-') {
        printInfo(AesEnvelope.decodeHeader(src.trim()), io);
        return;
      }

      /* STDIN: Base64 text when it looks like it, raw envelope otherwise */
      const buf  = await readAll(io.stdin);
      const text = buf.toString('utf8').trim();
      printInfo(
        AesEnvelope.decodeHeader(isBase64(text) ? text : new Uint8Array(buf)),
        io,
      );
    });

  return program;
}

/**
 * Parse and run `args` (without the node and script entries).
 * @returns the process exit code
 */
export async function runCli(args: readonly string[], io: CliIO = processIo()): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (err) {
    // commander has already printed its own message
    if (err instanceof CommanderError) return err.exitCode;
    reportError(err, io.stderr);
    return 1;
  }
}
