/**
 * Repository locators
 *
 * Accepted shapes:
 * - `host/owner/name`
 * - `https://host/owner/name` (optionally ending in `.git`)
 * - `git@host:owner/name.git`
 * - `owner/name`, resolved against the default host
 *
 * @module @autopr/core/models/locator
 */

import { ValidationError } from '../reliability/errors.js';

export interface RepositoryRef {
  host: string;
  owner: string;
  name: string;
  /** `owner/name` */
  fullName: string;
}

const HOST_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)*(?::\d{1,5})?$/i;
const OWNER_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,38})$/i;
const NAME_PATTERN = /^[a-z0-9._-]{1,100}$/i;

function invalid(locator: string, reason: string): ValidationError {
  return new ValidationError(`Invalid repository locator '${locator}': ${reason}`, {
    fieldErrors: { repositoryLocator: reason },
  });
}

function splitLocator(raw: string): string[] | undefined {
  const url = /^https?:\/\/([^/]+)\/(.+)$/i.exec(raw);
  if (url) {
    return [url[1], ...url[2].split('/')];
  }
  const ssh = /^git@([^:]+):(.+)$/.exec(raw);
  if (ssh) {
    return [ssh[1], ...ssh[2].split('/')];
  }
  if (raw.includes('://')) {
    return undefined;
  }
  return raw.split('/');
}

/**
 * Parse a locator into its parts, throwing ValidationError for anything
 * that is not one of the accepted shapes
 */
export function parseRepositoryLocator(locator: string, defaultHost = 'github.com'): RepositoryRef {
  const raw = locator.trim().replace(/\/+$/, '').replace(/\.git$/i, '');
  if (raw === '') {
    throw invalid(locator, 'locator is empty');
  }

  const segments = splitLocator(raw);
  if (!segments) {
    throw invalid(locator, 'unsupported URL scheme');
  }

  let host: string;
  let owner: string;
  let name: string;
  if (segments.length === 3) {
    [host, owner, name] = segments;
  } else if (segments.length === 2) {
    host = defaultHost;
    [owner, name] = segments;
  } else {
    throw invalid(locator, 'expected host/owner/name');
  }

  if (!HOST_PATTERN.test(host)) {
    throw invalid(locator, `'${host}' is not a valid host`);
  }
  if (!OWNER_PATTERN.test(owner)) {
    throw invalid(locator, `'${owner}' is not a valid owner`);
  }
  if (!NAME_PATTERN.test(name) || name === '.' || name === '..') {
    throw invalid(locator, `'${name}' is not a valid repository name`);
  }

  return { host: host.toLowerCase(), owner, name, fullName: `${owner}/${name}` };
}

/**
 * Canonical `host/owner/name` form
 */
export function formatRepositoryRef(ref: RepositoryRef): string {
  return `${ref.host}/${ref.owner}/${ref.name}`;
}
