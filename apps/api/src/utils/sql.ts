import { create, ErrorCodes } from './error';

const SQLITE_PREFIX = 'sqlite://';
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

// Pairs with `ESCAPE '\'` so the term matches as a literal substring.
export const escapeLike = (term: string) => term.replace(/[\\%_]/g, ch => `\\${ch}`);

export const containsPattern = (term: string) => `%${escapeLike(term)}%`;

/**
 * Accepts a filesystem path, `:memory:` or a `sqlite:///path` URL and returns
 * what better-sqlite3 expects. `sqlite://` with no path is an in-memory store.
 */
export const resolveStorePath = (location: string): string => {
  if (location.startsWith(SQLITE_PREFIX)) {
    const rest = location.slice(SQLITE_PREFIX.length);
    if (!rest) return ':memory:';
    return rest.startsWith('/') ? rest.slice(1) || ':memory:' : rest;
  }
  if (URL_SCHEME.test(location)) {
    throw create(ErrorCodes.UNSUPPORTED_STORE, {
      customMessage: `Unsupported store location: ${location}`
    });
  }
  return location;
};
