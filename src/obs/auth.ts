import * as crypto from 'crypto';

import { ObsAuthenticationError } from './errors.js';
import type { AuthenticationChallenge } from './protocol.js';

function sha256Base64(data: string): string {
  return crypto.createHash('sha256').update(data, 'utf8').digest('base64');
}

/**
 * Compute the Identify `authentication` string for a Hello challenge.
 *
 * secret = base64(sha256(password + salt))
 * auth   = base64(sha256(secret + challenge))
 *
 * The second hash runs over the base64 text of the secret, not its raw digest.
 *
 * @throws ObsAuthenticationError if the challenge or salt is empty
 */
export function computeAuthResponse(password: string, auth: AuthenticationChallenge): string {
  if (!auth.challenge || !auth.salt) {
    throw new ObsAuthenticationError('OBS authentication payload missing challenge or salt');
  }

  const secret = sha256Base64(password + auth.salt);
  return sha256Base64(secret + auth.challenge);
}
