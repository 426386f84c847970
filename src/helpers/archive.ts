import { chmod, mkdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { gunzipSync, gzipSync } from 'zlib';
import { extract, pack } from 'tar-stream';
import type { Headers } from 'tar-stream';
import type { PassThrough } from 'stream';
import type { FileEntry } from '../types';
import { FormatError, IOError } from '../errors';

const DIRECTORY_MODE = 0o755;
const DEFAULT_FILE_MODE = 0o644;
const PERMISSION_BITS = 0o7777;

export interface ArchiveOptions {
  /** Base for relative paths when touching the disk. Paths are stored as given. */
  cwd?: string;
}

async function readEntry(path: string, cwd: string): Promise<FileEntry> {
  const fullPath = resolve(cwd, path);
  try {
    const [content, stats] = await Promise.all([readFile(fullPath), stat(fullPath)]);
    return { path, content, mode: stats.mode & PERMISSION_BITS };
  } catch (error) {
    throw new IOError(`Failed to read file ${path}`, { cause: error });
  }
}

async function packEntries(entries: FileEntry[]): Promise<Buffer> {
  const tarball = pack();
  for (const entry of entries) {
    tarball.entry({ name: entry.path, mode: entry.mode, size: entry.content.length }, entry.content);
  }
  tarball.finalize();

  const chunks: Buffer[] = [];
  for await (const chunk of tarball) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

function unpackEntries(tarball: Buffer): Promise<FileEntry[]> {
  return new Promise((resolvePromise, reject) => {
    const entries: FileEntry[] = [];
    const extractor = extract();

    // tar-stream fails the stream itself when an entry is shorter than its header size.
    extractor.on('entry', (header: Headers, stream: PassThrough, next: () => void) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        const content = Buffer.concat(chunks);
        if (!header.type || header.type === 'file') {
          entries.push({
            path: header.name,
            content,
            mode: (header.mode ?? DEFAULT_FILE_MODE) & PERMISSION_BITS
          });
        }
        next();
      });
    });
    extractor.on('finish', () => resolvePromise(entries));
    extractor.on('error', reject);

    extractor.end(tarball);
  });
}

/**
 * Packs `paths` into one gzip-compressed tar blob, in order. The first
 * unreadable path aborts the whole archive.
 */
export async function createArchive(paths: string[], options: ArchiveOptions = {}): Promise<Buffer> {
  const cwd = options.cwd ?? process.cwd();
  const entries: FileEntry[] = [];
  for (const path of paths) {
    entries.push(await readEntry(path, cwd));
  }
  return gzipSync(await packEntries(entries));
}

export async function extractArchive(blob: Buffer): Promise<FileEntry[]> {
  let tarball: Buffer;
  try {
    tarball = gunzipSync(blob);
  } catch (error) {
    throw new FormatError('Invalid archive: not a gzip stream', { cause: error });
  }

  try {
    return await unpackEntries(tarball);
  } catch (error) {
    throw new FormatError('Invalid archive: malformed tar data', { cause: error });
  }
}

/**
 * Extracts the archive onto disk. Parent directories are created with 0755;
 * each file gets its stored mode. Files written before a failure are kept.
 */
export async function extractArchiveToFiles(blob: Buffer, options: ArchiveOptions = {}): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const entries = await extractArchive(blob);
  const written: string[] = [];

  for (const entry of entries) {
    const fullPath = resolve(cwd, entry.path);
    try {
      await mkdir(dirname(fullPath), { recursive: true, mode: DIRECTORY_MODE });
      await writeFile(fullPath, entry.content, { mode: entry.mode });
      await chmod(fullPath, entry.mode);
    } catch (error) {
      throw new IOError(`Failed to write file ${entry.path}`, { cause: error });
    }
    written.push(entry.path);
  }

  return written;
}

export async function listArchiveFiles(blob: Buffer): Promise<string[]> {
  const entries = await extractArchive(blob);
  return entries.map(entry => entry.path);
}
