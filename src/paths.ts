import { homedir } from 'node:os';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import type { ProcessEnv } from './nodePrimitives.js';

/** Maximum number of characters preserved in a sanitised filename. */
const MAX_FILENAME_LENGTH = 120;

/**
 * Raised when a derived location would leave the directory it must stay in.
 * Tool paths are caller supplied, so every store and discovery path is built
 * through {@link resolveWithin} or {@link safeJoin}.
 */
export class PathResolutionError extends Error {
  public readonly code = 'E-PATHS-ESCAPE';
  public readonly hint = 'keep paths within the configured base directory';
  /** Absolute path that the caller attempted to access. */
  public readonly attemptedPath: string;
  public readonly rootDirectory: string;
  public readonly details: { attemptedPath: string; rootDirectory: string; segment?: string; relative?: string };

  constructor(message: string, attemptedPath: string, rootDirectory: string, extras: { segment?: string; relative?: string } = {}) {
    super(message);
    this.name = 'PathResolutionError';
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
    this.details = { attemptedPath, rootDirectory, ...extras };
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathResolutionError('path escapes base directory', targetPath, absoluteRoot, { relative });
  }

  return targetPath;
}

/** Ensures that the directory containing the provided file path exists. */
export async function ensureParentDirectory(filePath: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
}

/**
 * Sanitises a filename so it can safely be persisted on disk. Path separators,
 * control characters and whitespace are replaced; an empty result falls back
 * to `unnamed`. Names that already follow the tool segment grammar are
 * returned unchanged.
 */
export function sanitizeFilename(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    return 'unnamed';
  }

  const withoutControl = trimmed.normalize('NFC').replace(/[\0-\x1F\x7F]/g, '');
  const basicSanitised = withoutControl
    .replace(/\.\./g, '')
    .replace(/[\\/:*?"<>|]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}._-]+/gu, '_');

  const limited = basicSanitised.replace(/^_+|_+$/g, '').slice(0, MAX_FILENAME_LENGTH);
  return limited.length > 0 ? limited : 'unnamed';
}

/**
 * Joins a base directory with segments while forbidding traversal. Every
 * segment is sanitised before resolution.
 */
export function safeJoin(base: string, ...parts: string[]): string {
  const segments: string[] = [];

  for (const rawPart of parts) {
    for (const candidate of rawPart.split(/[\\/]+/)) {
      if (!candidate || candidate === '.') {
        continue;
      }
      if (candidate === '..') {
        throw new PathResolutionError('path escapes base directory', path.resolve(base, rawPart), path.resolve(base), {
          segment: candidate,
        });
      }
      segments.push(sanitizeFilename(candidate));
    }
  }

  return resolveWithin(base, ...segments);
}

/**
 * Default location of the tool store: `$XDG_DATA_HOME/scriptbox/tools.storage`,
 * falling back to `~/.local/share` when the variable is unset.
 */
export function resolveDefaultStorageRoot(env: ProcessEnv = process.env): string {
  const dataHome = env.XDG_DATA_HOME?.trim();
  const base = dataHome ? path.resolve(dataHome) : path.join(homedir(), '.local', 'share');
  return path.join(base, 'scriptbox', 'tools.storage');
}
