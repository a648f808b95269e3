/**
 * Repository URL parsing.
 *
 * A remote URL maps to a fully qualified key (`host/org/repo`) that serves
 * as the repository id, so two spellings of the same remote (https and
 * scp-style ssh) land on the same record. The working copy directory is the
 * key encoded into one path segment.
 */

import { InvalidUrlError } from '../errors.js';

export interface ParsedRepositoryUrl {
  /** Fully qualified key, e.g. "github.com/acme/widgets". */
  key: string;
  /** Display name: the last path segment without ".git". */
  name: string;
}

const PROTOCOL_RE = /^(https?|ssh|git):\/\/(.+)$/;
const SCP_RE = /^[^@/\s]+@([^:/\s]+):(.+)$/;

function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

function build(host: string, segments: string[]): ParsedRepositoryUrl {
  if (!host) {
    throw new InvalidUrlError('missing host');
  }
  if (segments.length === 0) {
    throw new InvalidUrlError('missing repository path');
  }

  const last = segments[segments.length - 1].replace(/\.git$/, '');
  const cleaned = [...segments.slice(0, -1), last];
  if (cleaned.some((segment) => segment === '' || segment === '.' || segment === '..')) {
    throw new InvalidUrlError('invalid repository path');
  }

  // Keep the key usable as a relative filesystem path
  const key = [host, ...cleaned].join('/').replace(/[:@]/g, '_');
  return { key, name: last };
}

/** Parse a remote URL. Throws InvalidUrlError for anything unsupported. */
export function parseRepositoryUrl(url: string): ParsedRepositoryUrl {
  const trimmed = url.trim().replace(/\/+$/, '');
  if (!trimmed) {
    throw new InvalidUrlError('empty URL');
  }

  const protocol = trimmed.match(PROTOCOL_RE);
  if (protocol) {
    const rest = protocol[2];
    const [authority, ...segments] = rest.split('/');
    // Drop any credentials
    const host = authority.slice(authority.lastIndexOf('@') + 1);
    return build(host, splitPath(segments.join('/')));
  }

  const scp = trimmed.match(SCP_RE);
  if (scp) {
    return build(scp[1], splitPath(scp[2]));
  }

  throw new InvalidUrlError('unsupported URL format');
}

/**
 * Directory name of a repository's working copy below the repos directory.
 * One segment per key, so no working copy can sit inside another
 * (`example.com/r` and `example.com/r/tools` are siblings).
 */
export function workingCopyDirName(key: string): string {
  return encodeURIComponent(key);
}
