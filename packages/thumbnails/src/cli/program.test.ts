/**
 * Tests for the spindle-thumbnail commands
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { noopLogger } from '@spindle/sdk';
import { createProgram, EXIT_RENDER_FAILED, type ProgramIO } from './program';
import { readEnv } from '../env';

function recordingIO() {
  const io: { out: string[]; err: string[]; exitCode: number } = { out: [], err: [], exitCode: 0 };
  const programIO: ProgramIO = {
    out: line => io.out.push(line),
    err: line => io.err.push(line),
    setExitCode: code => {
      io.exitCode = code;
    }
  };
  return { io, programIO };
}

describe('spindle-thumbnail', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'spindle-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function run(args: string[]) {
    const { io, programIO } = recordingIO();
    await createProgram(readEnv({}), noopLogger, programIO).parseAsync(args, { from: 'user' });
    return io;
  }

  it('lists renderers', async () => {
    const io = await run(['list']);

    expect(io.out).toHaveLength(3);
    expect(io.out[0]).toMatch(/^1\. /);
    expect(io.out[0]).toContain('Text preview of the first 8 lines');
    expect(io.out[2]).toContain('File icon for anything else');
  });

  it('shows which renderer handles a file', async () => {
    const path = join(dir, 'photo.png');
    await writeFile(path, '');

    const io = await run(['which', path]);

    expect(io.out).toEqual(['photo.png: placeholder']);
  });

  it('names the selected renderer and counts the others', async () => {
    const path = join(dir, 'notes.txt');
    await writeFile(path, 'hello', 'utf8');

    const io = await run(['which', path]);

    expect(io.out).toHaveLength(2);
    expect(io.out[0]).toBe('notes.txt: text');
    expect(io.out[1]).toContain('1 other renderer(s) would also accept it');
  });

  it('renders a thumbnail next to the file', async () => {
    const path = join(dir, 'notes.txt');
    await writeFile(path, 'hello', 'utf8');

    const io = await run(['render', path]);

    const written = await readFile(`${path}.thumb.svg`, 'utf8');
    expect(written).toContain('>hello</text>');
    expect(io.out).toHaveLength(1);
    expect(io.out[0]).toContain(`${path}.thumb.svg (128x128)`);
    expect(io.exitCode).toBe(0);
  });

  it('writes to the requested output', async () => {
    const path = join(dir, 'notes.txt');
    const output = join(dir, 'preview.svg');
    await writeFile(path, 'hello', 'utf8');

    await run(['render', path, '--output', output]);

    expect(await readFile(output, 'utf8')).toContain('>hello</text>');
  });

  it('reports a renderer failure', async () => {
    const path = join(dir, 'notes.txt');
    await writeFile(path, Buffer.from([0xff, 0xfe]));

    const io = await run(['render', path]);

    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toContain('notes.txt: notes.txt is not valid UTF-8 text');
    expect(io.exitCode).toBe(EXIT_RENDER_FAILED);
  });
});
