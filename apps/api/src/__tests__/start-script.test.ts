import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';

const appRoot = fileURLToPath(new URL('../../', import.meta.url));
const repoRoot = fileURLToPath(new URL('../../../../', import.meta.url));

function startScript(dir: string): string {
  const manifest: unknown = JSON.parse(readFileSync(`${dir}package.json`, 'utf8'));
  if (typeof manifest !== 'object' || manifest === null || !('scripts' in manifest)) return '';
  const { scripts } = manifest;
  if (typeof scripts !== 'object' || scripts === null || !('start' in scripts)) return '';
  return typeof scripts.start === 'string' ? scripts.start : '';
}

describe('start scripts', () => {
  it.each([
    ['root', repoRoot],
    ['api package', appRoot],
  ])('should launch the API entry point from the %s', (_name, dir) => {
    const script = startScript(dir);
    const [runner, entry] = script.split(' ');

    expect(runner).toBe('tsx');
    expect(existsSync(`${dir}${entry}`)).toBe(true);
    expect(entry).toMatch(/src\/main\.ts$/);
  });
});
