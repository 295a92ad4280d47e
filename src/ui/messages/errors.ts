/**
 * Error messages printed by obsb commands.
 */

import { joinLines } from '@/ui/formatting.js';

export function genericError(message: string, context?: string): string {
  if (context) {
    return `Error: ${message}\n${context}`;
  }
  return `Error: ${message}`;
}

export function unknownError(): string {
  return 'Error: Unknown error';
}

/**
 * OBS could not be reached or the handshake failed.
 */
export function obsUnreachableError(reason: string): string {
  return joinLines(
    'Error: Could not connect to OBS',
    `  ${reason}`,
    '',
    'Suggestions:',
    '  Check that OBS is running with the WebSocket server enabled',
    '  (Tools > WebSocket Server Settings)',
    '  Update the endpoint with: obsb config set --host <host> --port <port>'
  );
}

export function obsAuthenticationError(reason: string): string {
  return joinLines(
    `Error: OBS authentication failed`,
    `  ${reason}`,
    '',
    'Suggestions:',
    '  Set the server password with: obsb config set --password <password>',
    '  Or export OBS_PASSWORD for a single run'
  );
}
