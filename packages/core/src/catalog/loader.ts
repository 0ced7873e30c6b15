/**
 * Catalog I/O. Reads `devices/*.json`, `schemas/*.json` and `features.json`
 * from a directory synchronously; this is the only I/O the library does and
 * it runs once before any resolution.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ErrorCode } from '../errors/codes.js';
import { CatalogError, toError } from '../types/errors.js';
import {
  loadCatalog,
  type Catalog,
  type CatalogSource,
  type LoadCatalogOptions,
  type LoadFailure,
  type LoadFailureKind,
} from './catalog.js';

const DEVICES_DIR = 'devices';
const SCHEMAS_DIR = 'schemas';
const FEATURES_FILE = 'features.json';

function readError(path: string, cause: unknown): CatalogError {
  const error = toError(cause);
  return new CatalogError({
    message: `Cannot read catalog file '${path}': ${error.message}`,
    issues: [{ path: '', message: error.message }],
    context: { path },
    errorCode: ErrorCode.CATALOG_READ_FAILED,
    cause: error,
  });
}

function readJson(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw readError(path, error);
  }
  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw readError(path, error);
  }
}

function readJsonDirectory(
  dir: string,
  kind: LoadFailureKind,
  failures: LoadFailure[]
): Record<string, unknown> {
  const documents: Record<string, unknown> = {};
  if (!existsSync(dir)) return documents;
  for (const entry of readdirSync(dir).sort()) {
    if (extname(entry) !== '.json') continue;
    const id = basename(entry, '.json');
    try {
      documents[id] = readJson(join(dir, entry));
    } catch (error) {
      if (!(error instanceof CatalogError)) throw error;
      failures.push({ kind, id, error });
    }
  }
  return documents;
}

/**
 * Raw documents of a catalog directory, without parsing them. A file that
 * cannot be read or is not JSON is left out and listed in `readFailures`.
 *
 * @throws CatalogError CATALOG_READ_FAILED when the root does not exist
 */
export function readCatalogSource(root: string): CatalogSource {
  if (!existsSync(root)) {
    throw readError(root, new Error('directory does not exist'));
  }
  const readFailures: LoadFailure[] = [];
  const devices = readJsonDirectory(join(root, DEVICES_DIR), 'device', readFailures);
  const schemas = readJsonDirectory(join(root, SCHEMAS_DIR), 'schema', readFailures);
  const featuresPath = join(root, FEATURES_FILE);
  let features: unknown;
  if (existsSync(featuresPath)) {
    try {
      features = readJson(featuresPath);
    } catch (error) {
      if (!(error instanceof CatalogError)) throw error;
      readFailures.push({ kind: 'features', id: 'features', error });
    }
  }
  return { devices, schemas, features, readFailures };
}

/**
 * @throws CatalogError CATALOG_READ_FAILED when the root does not exist;
 *   unreadable files and bad documents become load failures
 */
export function loadCatalogFromDirectory(
  root: string,
  options: LoadCatalogOptions = {}
): Catalog {
  return loadCatalog(readCatalogSource(root), options);
}

/** Directory of the catalog shipped with this package */
export function bundledCatalogDir(): string {
  return fileURLToPath(new URL('../../data', import.meta.url));
}

export function loadBundledCatalog(options: LoadCatalogOptions = {}): Catalog {
  return loadCatalogFromDirectory(bundledCatalogDir(), options);
}
