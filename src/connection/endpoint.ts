/**
 * Service Endpoint Descriptor
 *
 * Where a NAV service lives and how to authenticate against it. Descriptors
 * are validated once and frozen; every request address is derived from
 * {@link buildBaseUri}.
 */

import type { z } from 'zod';
import { ConfigValidationError } from '../core/errors.js';
import {
  CredentialsSchema,
  NavServiceConfigSchema,
  formatZodIssues,
} from '../validation/schemas.js';

export type NavCredentials = Readonly<z.output<typeof CredentialsSchema>>;

export type NavServiceConfig = Readonly<z.output<typeof NavServiceConfigSchema>>;

export type NavServiceConfigInput = z.input<typeof NavServiceConfigSchema>;

export interface NavEndpointsConfig {
  readonly odata: NavServiceConfig;
  readonly soap: NavServiceConfig;
}

/**
 * Validate and freeze an endpoint descriptor.
 *
 * @throws {ConfigValidationError} On a missing or malformed setting
 */
export function defineServiceConfig(input: NavServiceConfigInput): NavServiceConfig {
  const parsed = NavServiceConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    const field = parsed.error.issues[0]?.path.join('.');
    throw new ConfigValidationError(`Invalid NAV service configuration: ${issues.join('; ')}`, field, {
      issues,
    });
  }
  return Object.freeze({ ...parsed.data, credentials: Object.freeze(parsed.data.credentials) });
}

/**
 * Base address of a service.
 *
 * - OData: `{host}:{port}/{instance}/ODataV4/Company('{company}')/`
 * - SOAP: `{host}:{port}/{instance}/WS/{company}/{objectType|Page}/`
 */
export function buildBaseUri(config: NavServiceConfig): string {
  const host = config.host.replace(/\/+$/, '');
  const root = `${host}:${config.port}/${config.serverInstance}`;

  switch (config.serviceType) {
    case 'ODataV4':
      return new URL(`${root}/ODataV4/Company('${config.company}')/`).href;
    case 'SOAP':
      return new URL(`${root}/WS/${config.company}/${config.objectType ?? 'Page'}/`).href;
  }
}
