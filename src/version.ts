import { readFileSync } from 'node:fs'

// src/version.ts and dist/version.js both sit one level below the package root.
const PACKAGE_JSON_URL = new URL('../package.json', import.meta.url)

export function resolvePackageVersion(): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf8'))
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      return typeof parsed.version === 'string' ? parsed.version : '0.0.0'
    }
    return '0.0.0'
  } catch {
    return '0.0.0'
  }
}
