import * as fs from 'fs/promises';
import * as path from 'path';
import { Type } from '@sinclair/typebox';
import { defineCapability } from './types.js';

/**
 * Resolve a tool-supplied path against the working directory, refusing
 * anything that lands outside it.
 */
export function resolveInWorkingDirectory(workingDirectory: string, filename: string): string {
  const root = path.resolve(workingDirectory);
  const resolved = path.resolve(root, filename);
  const relative = path.relative(root, resolved);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new Error(`Path "${filename}" is outside the working directory`);
  }
  return resolved;
}

export const addFileTool = defineCapability({
  name: 'addFile',
  description: 'Create a file in the working directory and write content to it',
  parameters: Type.Object({
    filename: Type.String({ description: 'File name, may include a relative directory' }),
    content: Type.String({ description: 'File content' }),
  }),
  execute: async ({ filename, content }, ctx) => {
    const target = resolveInWorkingDirectory(ctx.workingDirectory, filename);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf8');
    return `Created file ${filename} (${content.length} characters written)`;
  },
});

export const readFileTool = defineCapability({
  name: 'read_file',
  description: 'Read a text file from the working directory',
  parameters: Type.Object({
    filename: Type.String({ description: 'File path relative to the working directory' }),
  }),
  execute: async ({ filename }, ctx) => {
    const target = resolveInWorkingDirectory(ctx.workingDirectory, filename);
    try {
      return await fs.readFile(target, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new Error(`File not found: ${filename}`, { cause: err });
      }
      throw err;
    }
  },
});

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function fileTools() {
  return [addFileTool, readFileTool];
}
