/**
 * @file errors.ts
 * @module shared/errors
 * @license MIT
 *
 * @fileoverview Error raised for conditions that abort a bindgen run.
 */

/**
 * Fatal input or environment problem: unreadable or malformed XML,
 * missing output directory, missing git metadata.
 *
 * The CLI reports the message and exits with {@link BindgenError.exitCode}.
 */
export class BindgenError extends Error {
    constructor(message: string, public readonly exitCode: number = 1, options?: ErrorOptions) {
        super(message, options);
        this.name = 'BindgenError';
    }
}
