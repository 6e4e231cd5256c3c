import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

const DEFAULT_PACKAGE: PackageInfo = { name: 'acme-conductor', version: '0.0.0-dev' };

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache name/version from the nearest package.json above this module.
 * Falls back to built-in defaults when none can be read.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  let dir = __dirname;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      cachedPkg = readPackageInfo(candidate);
      return cachedPkg;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  cachedPkg = DEFAULT_PACKAGE;
  return cachedPkg;
}

function readPackageInfo(path: string): PackageInfo {
  try {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (typeof raw !== 'object' || raw === null) return DEFAULT_PACKAGE;
    const name = 'name' in raw && typeof raw.name === 'string' ? raw.name : DEFAULT_PACKAGE.name;
    const version =
      'version' in raw && typeof raw.version === 'string' ? raw.version : DEFAULT_PACKAGE.version;
    return { name, version };
  } catch {
    // unreadable package.json
    return DEFAULT_PACKAGE;
  }
}

/** User-Agent for outbound ACME calls (RFC 8555 Section 6.1 asks clients to send one) */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
