/**
 * Error handling for the obsb CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
