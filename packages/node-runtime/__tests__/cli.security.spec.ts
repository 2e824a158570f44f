/* ------------------------------------------------------------------
   CLI path-traversal defence
   ------------------------------------------------------------------ */
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { promises as fs } from 'node:fs';
import { randomBytes } from 'node:crypto';
import { assertWritable } from '../src/cli.js';
import { FilesystemError } from '../../core/src/errors/index.js';
import { run } from './_io.js';

describe('aes-envelope CLI - assertWritable blocks "../" traversal', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'aes-envelope-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('refuses to write above cwd', async () => {
    const src = join(dir, 'in.bin');
    await fs.writeFile(src, randomBytes(8));

    const res = await run(['encrypt', src, '--key', 'BwcHBwcHBwcHBwcHBwcHBw==', '--out', '../evil.enc'], { cwd: dir });
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toMatch(/Refusing to write outside/);

    const evilPath = resolve(dir, '..', 'evil.enc');
    await expect(fs.access(evilPath)).rejects.toThrow();
  });

  it('allows the root itself and its subdirectories', async () => {
    await fs.mkdir(join(dir, 'sub'));
    const real = await fs.realpath(dir);
    expect(assertWritable('a.enc', dir)).toBe(join(real, 'a.enc'));
    expect(assertWritable('sub/b.enc', dir)).toBe(join(real, 'sub', 'b.enc'));
    expect(assertWritable('-', dir)).toBeUndefined();
  });

  it('rejects absolute paths elsewhere and missing directories', () => {
    expect(() => assertWritable(join(tmpdir(), 'x.enc'), dir)).toThrow(FilesystemError);
    expect(() => assertWritable('missing/x.enc', dir)).toThrow('Output directory does not exist');
  });
});
