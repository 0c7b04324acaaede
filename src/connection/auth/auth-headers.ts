/**
 * Authorization headers for NAV web services.
 *
 * Basic and Bearer are sent on every request. Ambient credentials send
 * nothing and rely on whatever sits in front of the server (a reverse proxy,
 * an allow-listed network). Windows/NTLM handshakes are not something a
 * single fetch call can carry and are not supported.
 */

import type { NavCredentials } from '../endpoint.js';

export function buildAuthHeaders(credentials: NavCredentials): Record<string, string> {
  switch (credentials.kind) {
    case 'basic': {
      const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64');
      return { Authorization: `Basic ${token}` };
    }
    case 'bearer':
      return { Authorization: `Bearer ${credentials.token}` };
    case 'ambient':
      return {};
  }
}
