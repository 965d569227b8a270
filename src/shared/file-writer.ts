/**
 * @file file-writer.ts
 * @module shared/file-writer
 * @license MIT
 *
 * @fileoverview Writes generated sources under an output root with
 * statistics tracking.
 */

import { mkdirSync, writeFileSync, existsSync, statSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { BindgenError } from './errors.js';

/**
 * Statistics about write operations.
 */
export interface WriteStats {
    /** Total number of files written */
    filesWritten: number;
    /** Total number of directories created */
    directoriesCreated: number;
    /** Total bytes written across all files */
    bytesWritten: number;
}

/**
 * Writes generated files below an existing output root.
 *
 * The root itself must already exist (it is normally a checkout of the
 * bindings repository); directories below it are created on demand.
 *
 * @example
 * ```typescript
 * const writer = new FileWriter('../roc-go');
 * writer.writeRelative('roc/interface.go', source);
 * console.log(writer.getStats());
 * // { filesWritten: 1, directoriesCreated: 0, bytesWritten: 1234 }
 * ```
 */
export class FileWriter {
    private outputDir: string;
    private stats: WriteStats = {
        filesWritten: 0,
        directoriesCreated: 0,
        bytesWritten: 0,
    };
    private createdDirs: Set<string> = new Set();

    /**
     * Create a new FileWriter.
     * @param outputDir - Base directory for all output files
     */
    constructor(outputDir: string) {
        this.outputDir = outputDir;
    }

    /**
     * Fail unless the output root exists and is a directory.
     * @throws {BindgenError} When the directory is missing
     */
    checkOutputDir(): void {
        if (!existsSync(this.outputDir) || !statSync(this.outputDir).isDirectory()) {
            throw new BindgenError(`Output directory doesn't exist: ${this.outputDir}`);
        }
    }

    /**
     * Write a file given its path relative to the output root.
     * @param relativePath - Path below the output root
     * @param content - Content to write
     * @returns Full path to the written file
     */
    writeRelative(relativePath: string, content: string): string {
        const filePath = join(this.outputDir, relativePath);
        this.writeFile(filePath, content);
        return filePath;
    }

    /**
     * Write arbitrary file, creating its directory if needed.
     *
     * @param filePath - Full path to the output file
     * @param content - Content to write
     */
    writeFile(filePath: string, content: string): void {
        const dir = dirname(filePath);

        if (!this.createdDirs.has(dir)) {
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true });
                this.stats.directoriesCreated++;
            }
            this.createdDirs.add(dir);
        }

        writeFileSync(filePath, content, 'utf-8');
        this.stats.filesWritten++;
        this.stats.bytesWritten += Buffer.byteLength(content, 'utf-8');
    }

    /**
     * Get write statistics.
     * @returns Copy of the current write statistics
     */
    getStats(): WriteStats {
        return { ...this.stats };
    }

    /**
     * Reset write statistics to zero.
     */
    resetStats(): void {
        this.stats = {
            filesWritten: 0,
            directoriesCreated: 0,
            bytesWritten: 0,
        };
    }
}
