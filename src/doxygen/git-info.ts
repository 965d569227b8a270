/**
 * @file git-info.ts
 * @module doxygen/git-info
 * @license MIT
 *
 * @fileoverview Reads the toolkit revision printed in generated file banners.
 */

import { execFileSync } from 'node:child_process';
import { BindgenError } from '../shared/errors.js';
import type { GitInfo } from '../model/types.js';

function git(toolkitDir: string, args: string[]): string {
    try {
        return execFileSync('git', args, {
            cwd: toolkitDir,
            encoding: 'utf-8',
            stdio: ['ignore', 'pipe', 'pipe'],
        }).trim();
    } catch (error) {
        throw new BindgenError(
            `Can't read git metadata from ${toolkitDir}: git ${args.join(' ')} failed`,
            1,
            { cause: error }
        );
    }
}

/**
 * Latest tag (`git describe --tags`) and short commit hash of a checkout.
 * @throws {BindgenError} When the directory is not a git checkout or has no tags
 */
export function readGitInfo(toolkitDir: string): GitInfo {
    return {
        tag: git(toolkitDir, ['describe', '--tags']),
        commit: git(toolkitDir, ['rev-parse', '--short', 'HEAD']),
    };
}
