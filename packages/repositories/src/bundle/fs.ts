// Bundle IO over the local filesystem, and an in-memory one for tests

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { BundleIO } from './types.js';

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Files are written to a sibling temp file and renamed into place.
 */
export function createFilesystemIO(): BundleIO {
  return {
    reader: {
      exists: pathExists,

      async isDirectory(target: string): Promise<boolean> {
        try {
          return (await fs.stat(target)).isDirectory();
        } catch {
          return false;
        }
      },

      readFile: (target: string) => fs.readFile(target, 'utf-8'),

      listDirectory: (target: string) => fs.readdir(target),
    },

    writer: {
      exists: pathExists,

      async writeFile(target: string, content: string): Promise<void> {
        await fs.mkdir(path.dirname(target), { recursive: true });
        const temp = `${target}.${process.pid}.tmp`;
        await fs.writeFile(temp, content, 'utf-8');
        await fs.rename(temp, target);
      },

      async mkdir(target: string): Promise<void> {
        await fs.mkdir(target, { recursive: true });
      },

      async remove(target: string): Promise<void> {
        await fs.rm(target, { recursive: true, force: true });
      },
    },
  };
}

export type InMemoryBundleIO = BundleIO & {
  files: Map<string, string>;
  directories: Set<string>;
};

/**
 * Reader and writer sharing one in-memory tree. Paths use '/'.
 */
export function createInMemoryIO(): InMemoryBundleIO {
  const files = new Map<string, string>();
  const directories = new Set<string>();

  const addDirectory = (dir: string) => {
    for (let d = dir; d && d !== '.' && d !== '/'; d = path.posix.dirname(d)) {
      directories.add(d);
    }
  };
  const exists = async (target: string) => files.has(target) || directories.has(target);
  const under = (target: string, candidate: string) =>
    candidate === target || candidate.startsWith(`${target}/`);

  return {
    files,
    directories,

    reader: {
      exists,

      isDirectory: async (target: string) => directories.has(target),

      async readFile(target: string): Promise<string> {
        const content = files.get(target);
        if (content === undefined) {
          throw new Error(`File not found: ${target}`);
        }
        return content;
      },

      async listDirectory(target: string): Promise<string[]> {
        const prefix = `${target}/`;
        const entries = new Set<string>();
        for (const candidate of [...files.keys(), ...directories]) {
          if (!candidate.startsWith(prefix)) continue;
          const [first] = candidate.slice(prefix.length).split('/');
          if (first) entries.add(first);
        }
        return [...entries];
      },
    },

    writer: {
      exists,

      async writeFile(target: string, content: string): Promise<void> {
        files.set(target, content);
        addDirectory(path.posix.dirname(target));
      },

      async mkdir(target: string): Promise<void> {
        addDirectory(target);
      },

      async remove(target: string): Promise<void> {
        for (const file of [...files.keys()]) {
          if (under(target, file)) files.delete(file);
        }
        for (const dir of [...directories]) {
          if (under(target, dir)) directories.delete(dir);
        }
      },
    },
  };
}
