/**
 * Credentials for the googleapis clients
 *
 * The service is handed a bearer token; minting and refreshing it happens
 * outside this process.
 *
 * @module services/adapters/google-auth
 */

import { google } from 'googleapis';

export function bearerTokenAuth(accessToken: string) {
  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });
  return auth;
}
