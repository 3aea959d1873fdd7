import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatVersion, readPackageInfo } from './package-info.js';

describe('readPackageInfo', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'git-cc-pkg-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should include build details from package.json', async () => {
    const path = join(dir, 'package.json');
    await writeFile(
      path,
      JSON.stringify({ version: '1.2.3', gitCc: { commit: 'abc123', date: '2026-01-01' } })
    );

    expect(formatVersion(readPackageInfo(path))).toBe(
      'version: 1.2.3, commit: abc123, built at 2026-01-01'
    );
  });

  it('should default missing build details', async () => {
    const path = join(dir, 'package.json');
    await writeFile(path, JSON.stringify({ version: '1.2.3' }));

    expect(formatVersion(readPackageInfo(path))).toBe(
      'version: 1.2.3, commit: none, built at unknown'
    );
  });

  it('should report a dev build when package.json is missing', () => {
    expect(formatVersion(readPackageInfo(join(dir, 'package.json')))).toBe(
      'version: dev, commit: none, built at unknown'
    );
  });

  it('should find the project package.json by default', () => {
    expect(readPackageInfo().version).toMatch(/^\d+\.\d+\.\d+/);
  });
});
