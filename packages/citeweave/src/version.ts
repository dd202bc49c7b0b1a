import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

export interface EngineInfo {
  name: string;
  version: string;
}

const FALLBACK_INFO: EngineInfo = { name: 'citeweave', version: '0.0.0' };

const nonEmpty = (value: unknown): value is string => typeof value === 'string' && value.trim().length > 0;

export const getEngineInfo = (): EngineInfo => {
  try {
    const pkg: { name?: unknown; version?: unknown } = require('../package.json');
    return {
      name: nonEmpty(pkg.name) ? pkg.name : FALLBACK_INFO.name,
      version: nonEmpty(pkg.version) ? pkg.version : FALLBACK_INFO.version
    };
  } catch {
    // Not resolvable from a bundled build.
    return { ...FALLBACK_INFO };
  }
};
