/**
 * Source reference parsing for unit templates.
 *
 * Format: `[getter::]location[//subpath][?ref=version]`, e.g.
 *   git::https://example.com/catalog.git//units/vpc?ref=v1.2.0
 *   ../catalog/units/vpc
 *
 * The query string carrying `ref` must come after the sub-path separator.
 */
import { InvalidSourceError } from '../../utils/errors.js';

export interface SourceReference {
  /** Original string */
  raw: string;
  /** Forced getter, e.g. "git" for `git::` */
  getter?: string;
  /** Fetch location without getter, sub-path or query */
  location: string;
  /** Path inside the fetched location */
  subpath?: string;
  /** Version / ref selector */
  ref?: string;
  /** True for relative or absolute filesystem paths */
  local: boolean;
}

const GETTER_PATTERN = /^([a-z][a-z0-9+.-]*)::(.+)$/;
// "//" that is not part of "scheme://"
const SUBPATH_SEPARATOR = /(?<!:)\/\//;

/**
 * Parse a unit source string.
 *
 * @throws InvalidSourceError when the string is empty, the ref selector
 *   precedes the sub-path, or the query string is malformed
 */
export function parseSource(raw: string): SourceReference {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidSourceError(raw, 'source is empty');
  }

  let rest = trimmed;
  let getter: string | undefined;
  const getterMatch = rest.match(GETTER_PATTERN);
  if (getterMatch) {
    getter = getterMatch[1];
    rest = getterMatch[2];
  }

  const queryIndex = rest.indexOf('?');
  const subpathMatch = SUBPATH_SEPARATOR.exec(rest);
  if (queryIndex >= 0 && subpathMatch && subpathMatch.index > queryIndex) {
    throw new InvalidSourceError(raw, 'the ?ref= selector must follow the //subpath, not precede it');
  }

  let query: string | undefined;
  if (queryIndex >= 0) {
    query = rest.slice(queryIndex + 1);
    rest = rest.slice(0, queryIndex);
  }

  let location = rest;
  let subpath: string | undefined;
  const separator = SUBPATH_SEPARATOR.exec(rest);
  if (separator) {
    location = rest.slice(0, separator.index);
    subpath = rest.slice(separator.index + 2).replace(/\/+$/, '');
    if (!subpath) {
      throw new InvalidSourceError(raw, 'sub-path after // is empty');
    }
  }
  if (!location) {
    throw new InvalidSourceError(raw, 'location is empty');
  }

  let ref: string | undefined;
  if (query !== undefined) {
    const params = new URLSearchParams(query);
    const value = params.get('ref');
    if (params.has('ref') && !value) {
      throw new InvalidSourceError(raw, 'ref selector is empty');
    }
    ref = value ?? undefined;
  }

  return {
    raw: trimmed,
    getter,
    location,
    subpath,
    ref,
    local: !getter && isLocalPath(location),
  };
}

function isLocalPath(location: string): boolean {
  return location.startsWith('./') || location.startsWith('../') || location.startsWith('/') || location === '.';
}

/**
 * Render a parsed source back into its canonical string form.
 */
export function formatSource(source: SourceReference): string {
  let result = source.getter ? `${source.getter}::${source.location}` : source.location;
  if (source.subpath) {
    result += `//${source.subpath}`;
  }
  if (source.ref) {
    result += `?ref=${source.ref}`;
  }
  return result;
}
