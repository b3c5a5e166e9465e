/**
 * Gmail OAuth2 client.
 *
 * Built from a long-lived refresh token; googleapis exchanges it for access
 * tokens and refreshes them as they expire. Obtaining the refresh token
 * (the consent flow) happens outside this tool.
 *
 * @module lib/gmail/auth
 */

import { google } from 'googleapis';
import type { Credentials } from '@/config/app';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('GmailAuth');

export type GmailAuthClient = InstanceType<typeof google.auth.OAuth2>;

/**
 * Creates an OAuth2 client for the Gmail API.
 *
 * @example
 * ```typescript
 * const auth = createGmailAuth(requireCredentials(loadEnv()).gmail);
 * const mailbox = new GmailMailboxSource(auth, { timeoutMs: 30000 });
 * ```
 */
export function createGmailAuth(credentials: Credentials['gmail']): GmailAuthClient {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  auth.setCredentials({ refresh_token: credentials.refreshToken });

  auth.on('tokens', (tokens) => {
    logger.debug('Access token refreshed', {
      expiresAt: tokens.expiry_date ? new Date(tokens.expiry_date).toISOString() : undefined,
    });
  });

  return auth;
}
