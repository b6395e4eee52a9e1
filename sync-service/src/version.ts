import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

// Из исходников package.json лежит на уровень выше, из dist/sync-service/src на три.
const candidates = [new URL('../package.json', import.meta.url), new URL('../../../sync-service/package.json', import.meta.url)];

function readVersion(): string {
  for (const url of candidates) {
    const file = fileURLToPath(url);
    if (!existsSync(file)) continue;
    const pkg: unknown = JSON.parse(readFileSync(file, 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  }
  return '0.0.0';
}

export const serviceVersion = readVersion();
