/**
 * Document tools for the writing team.
 *
 * Every path is resolved inside the workspace directory given at
 * construction. A missing file or a bad line number is reported as a failed
 * ToolResult, never thrown.
 */

import * as fs from 'node:fs/promises';
import { existsSync, realpathSync } from 'node:fs';
import * as path from 'node:path';
import type { ToolResult } from '@crew-control/contracts';
import { toolError } from './tool-error.js';

// ═══════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════

export type PathValidation = { valid: true; resolved: string } | { valid: false; resolved: string; error: string };

/**
 * Validate path is within working directory (prevent path traversal)
 */
export function validatePath(workingDir: string, filePath: string): PathValidation {
  const root = existsSync(workingDir) ? realpathSync(workingDir) : path.resolve(workingDir);
  let resolved = path.resolve(root, filePath);

  // Resolve symlinks to prevent symlink-based bypasses
  if (existsSync(resolved)) {
    resolved = realpathSync(resolved);
  }

  const relative = path.relative(root, resolved);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return {
      valid: false,
      resolved,
      error: `Cannot access "${filePath}" - path is outside working directory.`,
    };
  }

  return { valid: true, resolved };
}

/** Keeps line endings, like reading a file line by line. */
function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

// ═══════════════════════════════════════════════════════════════════════════
// Workspace
// ═══════════════════════════════════════════════════════════════════════════

export class DocumentWorkspace {
  readonly workingDir: string;

  constructor(workingDir: string) {
    this.workingDir = path.resolve(workingDir);
  }

  /**
   * Write `points` as a numbered outline.
   */
  async createOutline(points: readonly string[], fileName: string): Promise<ToolResult> {
    const content = points.map((point, i) => `${i + 1}. ${point}\n`).join('');
    const result = await this.write(fileName, content);
    return result.success ? { ...result, output: `Outline saved to ${fileName}` } : result;
  }

  /**
   * Lines `[start, end)`, 0-indexed; `end` omitted reads to the end.
   */
  async readDocument(fileName: string, start?: number, end?: number): Promise<ToolResult> {
    const resolved = await this.existingFile(fileName);
    if (!resolved.ok) {
      return resolved.error;
    }
    const lines = splitLines(await fs.readFile(resolved.path, 'utf-8'));
    return {
      success: true,
      output: lines.slice(start ?? 0, end).join(''),
      metadata: { fileName, totalLines: lines.length },
    };
  }

  async writeDocument(content: string, fileName: string): Promise<ToolResult> {
    const result = await this.write(fileName, content);
    return result.success ? { ...result, output: `Document saved to ${fileName}` } : result;
  }

  /**
   * Insert text at 1-indexed line numbers, lowest first. Each insert shifts
   * the lines below it. Any out-of-range line leaves the file untouched.
   */
  async editDocument(fileName: string, inserts: Readonly<Record<number, string>>): Promise<ToolResult> {
    const resolved = await this.existingFile(fileName);
    if (!resolved.ok) {
      return resolved.error;
    }

    const lines = splitLines(await fs.readFile(resolved.path, 'utf-8'));
    const sorted = Object.entries(inserts)
      .map(([line, text]) => [Number(line), text] as const)
      .sort((a, b) => a[0] - b[0]);

    for (const [lineNumber, text] of sorted) {
      if (!Number.isInteger(lineNumber) || lineNumber < 1 || lineNumber > lines.length + 1) {
        return toolError({
          code: 'LINE_OUT_OF_RANGE',
          message: `Line number ${lineNumber} is out of range.`,
          hint: `Use a line between 1 and ${lines.length + 1}.`,
          details: { fileName, lineNumber, totalLines: lines.length },
        });
      }
      lines.splice(lineNumber - 1, 0, `${text}\n`);
    }

    await fs.writeFile(resolved.path, lines.join(''), 'utf-8');
    return { success: true, output: `Document edited and saved to ${fileName}`, metadata: { fileName } };
  }

  /**
   * File names directly inside the workspace, sorted.
   */
  async listDocuments(): Promise<ToolResult> {
    await fs.mkdir(this.workingDir, { recursive: true });
    const entries = await fs.readdir(this.workingDir, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
    return { success: true, output: files.join('\n'), metadata: { files } };
  }

  private async write(fileName: string, content: string): Promise<ToolResult> {
    const validation = validatePath(this.workingDir, fileName);
    if (!validation.valid) {
      return toolError({
        code: 'PATH_VALIDATION_FAILED',
        message: validation.error,
        hint: 'Use a path inside the working directory.',
        details: { fileName, workingDir: this.workingDir },
      });
    }
    await fs.mkdir(path.dirname(validation.resolved), { recursive: true });
    await fs.writeFile(validation.resolved, content, 'utf-8');
    return { success: true, metadata: { fileName, bytes: Buffer.byteLength(content, 'utf-8') } };
  }

  private async existingFile(
    fileName: string
  ): Promise<{ ok: true; path: string } | { ok: false; error: ToolResult }> {
    const validation = validatePath(this.workingDir, fileName);
    if (!validation.valid) {
      return {
        ok: false,
        error: toolError({
          code: 'PATH_VALIDATION_FAILED',
          message: validation.error,
          hint: 'Use a path inside the working directory.',
          details: { fileName, workingDir: this.workingDir },
        }),
      };
    }

    const stats = await fs.stat(validation.resolved).catch(() => undefined);
    if (!stats?.isFile()) {
      return {
        ok: false,
        error: toolError({
          code: 'FILE_NOT_FOUND',
          message: `File ${fileName} not found`,
          hint: 'Use listDocuments to see available files.',
          details: { fileName },
        }),
      };
    }
    return { ok: true, path: validation.resolved };
  }
}
