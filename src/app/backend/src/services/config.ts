import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { DES_ALIASES_SCHEMA, getErrorMessage, type LocationBook } from '@did-webs/node';
import type { EnvConfig } from '../types/index.js';

const DEFAULT_PORT = 7677;

function parsePort(value: string | undefined): number {
  if (!value) {
    return DEFAULT_PORT;
  }
  const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!(port > 0 && port <= 65535)) {
    throw new Error(`Invalid PORT: ${value}`);
  }
  return port;
}

export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const keriaUrl = env.KERIA_URL || 'http://localhost:3901';
  return {
    port: parsePort(env.PORT),
    keriaUrl,
    keriaBootUrl: env.KERIA_BOOT_URL || 'http://localhost:3903',
    // KERIA serves its HTTP API next to the admin API unless told otherwise
    keriaHttpUrl: env.KERIA_HTTP_URL || keriaUrl.replace(':3901', ':3902'),
    keriaPasscode: env.KERIA_PASSCODE || undefined,
    didPath: (env.DID_PATH || 'keri').replace(/^\/+|\/+$/g, ''),
    designatedAliasesSchema: env.DESIGNATED_ALIASES_SCHEMA || DES_ALIASES_SCHEMA,
    locationsPath: env.LOCATIONS_PATH || undefined,
  };
}

function isLocationBook(value: unknown): value is LocationBook {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(
      urls =>
        typeof urls === 'object' &&
        urls !== null &&
        !Array.isArray(urls) &&
        Object.values(urls).every(url => typeof url === 'string'),
    )
  );
}

/** Loads the witness / endpoint location book from disk. */
export function loadLocationBook(path: string): LocationBook {
  // Resolve relative to the working directory
  const absolutePath = resolve(process.cwd(), path);

  if (!existsSync(absolutePath)) {
    throw new Error(`Location book not found at: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to parse location book: ${getErrorMessage(error)}`);
  }

  if (!isLocationBook(parsed)) {
    throw new Error(`Location book at ${absolutePath} must map endpoint AIDs to { scheme: url } objects`);
  }
  return parsed;
}
