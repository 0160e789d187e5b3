/**
 * PathCollector
 *
 * Expands user-selected files and directories into the ordered list of XML
 * files to process. Only stat and list operations: no file content is read.
 */

import { readdir, realpath, stat } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import type { CollectionDiagnostic, CollectionDiagnosticKind } from '@nfse-reader/contracts';
import { createSafeLogger, type Logger } from '@nfse-reader/shared';
import { DEFAULT_BATCH_CONFIG } from '../config/effective-config.js';

export interface CollectOptions {
  /** Base for relative entries (default: process.cwd()) */
  cwd?: string;
  /** Follow symbolic links found inside directories (default: true) */
  followSymlinks?: boolean;
  /** Directory nesting levels visited below each entry (default: 32) */
  maxDepth?: number;
  logger?: Logger;
}

export interface CollectionResult {
  /** Absolute paths, first-seen order, each file once */
  paths: string[];
  diagnostics: CollectionDiagnostic[];
}

const XML_EXTENSION = '.xml';

function isXmlFile(path: string): boolean {
  return extname(path).toLowerCase() === XML_EXTENSION;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Code-unit order, independent of locale
 */
function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

class Collector {
  readonly paths: string[] = [];
  readonly diagnostics: CollectionDiagnostic[] = [];

  /** Canonical paths of files already listed */
  private readonly seenFiles = new Set<string>();

  /** Canonical paths of directories already visited */
  private readonly visitedDirectories = new Set<string>();

  constructor(
    private readonly followSymlinks: boolean,
    private readonly maxDepth: number,
    private readonly logger: Logger,
  ) {}

  async addEntry(path: string): Promise<void> {
    let stats: Stats;
    try {
      stats = await stat(path);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        this.report(path, 'not-found', 'No such file or directory');
      } else {
        this.report(path, 'unsupported-entry', `Cannot inspect entry (${code ?? 'unknown error'})`);
      }
      return;
    }

    if (stats.isDirectory()) {
      await this.visitDirectory(path, 0);
    } else if (stats.isFile()) {
      if (isXmlFile(path)) {
        await this.addFile(path);
      } else {
        this.logger.debug('Skipping non-XML file', { path });
      }
    } else {
      this.report(path, 'unsupported-entry', 'Not a regular file or directory');
    }
  }

  private async addFile(path: string): Promise<void> {
    const canonical = await realpath(path).catch(() => path);
    if (this.seenFiles.has(canonical)) {
      return;
    }
    this.seenFiles.add(canonical);
    this.paths.push(path);
  }

  private async visitDirectory(directory: string, depth: number): Promise<void> {
    let entries: Dirent[];
    try {
      const canonical = await realpath(directory);
      if (this.visitedDirectories.has(canonical)) {
        this.logger.debug('Directory already visited', { path: directory });
        return;
      }
      this.visitedDirectories.add(canonical);
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.report(directory, 'unreadable-directory', `Cannot read directory (${errorCode(error) ?? 'unknown error'})`);
      return;
    }

    entries.sort(byName);

    for (const entry of entries) {
      const path = join(directory, entry.name);

      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();

      if (entry.isSymbolicLink()) {
        if (!this.followSymlinks) {
          this.logger.debug('Skipping symbolic link', { path });
          continue;
        }
        try {
          const target = await stat(path);
          isDirectory = target.isDirectory();
          isFile = target.isFile();
        } catch {
          this.report(path, 'not-found', 'Broken symbolic link');
          continue;
        }
      }

      if (isDirectory) {
        if (depth + 1 > this.maxDepth) {
          this.report(path, 'depth-limit', `Maximum directory depth (${this.maxDepth}) exceeded`);
          continue;
        }
        await this.visitDirectory(path, depth + 1);
      } else if (isFile && isXmlFile(entry.name)) {
        await this.addFile(path);
      }
    }
  }

  private report(path: string, kind: CollectionDiagnosticKind, message: string): void {
    this.diagnostics.push({ path, kind, message });
    this.logger.warn('Entry skipped', { kind, message });
  }
}

/**
 * Expand entries into XML file paths.
 *
 * - File entries are kept when their extension is `.xml` (any case).
 * - Directories are walked recursively, entries sorted by name.
 * - Every directory is keyed by its canonical path, so symbolic link
 *   cycles terminate.
 *
 * Problems with an entry or directory become diagnostics; collection always
 * goes on with the remaining entries.
 */
export async function collectPaths(
  entries: readonly string[],
  options: CollectOptions = {},
): Promise<CollectionResult> {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? createSafeLogger({ level: DEFAULT_BATCH_CONFIG.logLevel, prefix: 'nfse-reader:collector' });
  const collector = new Collector(
    options.followSymlinks ?? DEFAULT_BATCH_CONFIG.followSymlinks,
    options.maxDepth ?? DEFAULT_BATCH_CONFIG.maxDepth,
    logger,
  );

  for (const entry of entries) {
    await collector.addEntry(resolve(cwd, entry));
  }

  logger.debug('Collection finished', {
    fileCount: collector.paths.length,
    diagnosticCount: collector.diagnostics.length,
  });

  return { paths: collector.paths, diagnostics: collector.diagnostics };
}
