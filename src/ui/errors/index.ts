/**
 * Error handling for the dgramlink CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
export { exitCodeForError, isServerUnavailableError } from './utils.js';
