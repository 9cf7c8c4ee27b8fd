/**
 * BindingCatalog — the set of binding files available to one source.
 *
 * This module handles:
 * - Finding binding files (*.yaml, *.yml) in directories
 * - Resolving `include:` names by file basename
 * - Pre-selecting files that may define a given set of schemas
 *
 * It does NOT handle:
 * - Parsing or validating bindings (that's Binding's job)
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { SchemaError } from '../errors.js';
import type { IncludeResolver } from './types.js';

/**
 * Default file patterns for binding files.
 */
const DEFAULT_PATTERNS = ['*.yaml', '*.yml'];

/**
 * One binding file known to the catalog.
 */
export interface BindingFile {
  /** Path of the file (absolute when loaded from disk) */
  path: string;
  /** File contents */
  source: string;
}

/**
 * Options for loading binding catalogs.
 */
export interface BindingLoadOptions {
  /** Directories to search */
  dirs: string[];
  /** File patterns to include (default: ['*.yaml', '*.yml']) */
  patterns?: string[];
  /** Whether to recursively search directories (default: true) */
  recursive?: boolean;
}

export class BindingCatalog implements IncludeResolver {
  private readonly files: BindingFile[] = [];
  private readonly byName = new Map<string, BindingFile>();

  /**
   * Add a file. A later file with the same basename shadows earlier ones for
   * include resolution.
   */
  add(path: string, source: string): void {
    const file = { path, source };
    this.files.push(file);
    this.byName.set(basename(path), file);
  }

  resolve(name: string): BindingFile | undefined {
    return this.byName.get(name);
  }

  get size(): number {
    return this.files.length;
  }

  getAll(): readonly BindingFile[] {
    return this.files;
  }

  /**
   * Files whose text mentions at least one of `schemas`. Other files cannot
   * define a binding for them.
   */
  candidates(schemas: Iterable<string>): BindingFile[] {
    const wanted = [...schemas];
    return this.files.filter(file => wanted.some(schema => file.source.includes(schema)));
  }
}

/**
 * Check if a filename matches any of the patterns.
 */
function matchesFilePattern(filename: string, patterns: string[]): boolean {
  return patterns.some(pattern => {
    if (pattern.startsWith('*')) {
      return filename.endsWith(pattern.slice(1));
    }
    return filename === pattern;
  });
}

/**
 * Recursively find all binding files in a directory, sorted by name.
 */
async function findBindingFiles(dirPath: string, patterns: string[], recursive: boolean): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        files.push(...(await findBindingFiles(fullPath, patterns, recursive)));
      }
    } else if (entry.isFile() && matchesFilePattern(entry.name, patterns)) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Load all binding files from the given directories.
 */
export async function loadBindingCatalog(options: BindingLoadOptions): Promise<BindingCatalog> {
  const patterns = options.patterns ?? DEFAULT_PATTERNS;
  const recursive = options.recursive ?? true;
  const catalog = new BindingCatalog();

  for (const dir of options.dirs) {
    let isDirectory = false;
    try {
      isDirectory = (await stat(dir)).isDirectory();
    } catch (err) {
      throw new SchemaError(`binding directory does not exist: ${err instanceof Error ? err.message : String(err)}`, dir);
    }
    if (!isDirectory) {
      throw new SchemaError('binding directory is not a directory', dir);
    }
    for (const filePath of await findBindingFiles(dir, patterns, recursive)) {
      catalog.add(filePath, await readFile(filePath, 'utf-8'));
    }
  }
  return catalog;
}

/**
 * Build a catalog from content strings (for testing or in-memory use).
 *
 * @param files - path -> content
 */
export function createBindingCatalog(files: Map<string, string> | Record<string, string>): BindingCatalog {
  const catalog = new BindingCatalog();
  const entries = files instanceof Map ? files.entries() : Object.entries(files);
  for (const [path, source] of entries) {
    catalog.add(path, source);
  }
  return catalog;
}
