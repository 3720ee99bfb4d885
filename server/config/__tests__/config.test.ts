import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { validateConfig } from '../index';

describe('validateConfig', () => {
  let workDir: string;

  beforeAll(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vat-summary-config-'));
  });

  afterAll(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('passes with a database and an existing export directory', () => {
    expect(validateConfig({ databaseUrl: 'postgres://localhost/test', exportDir: workDir })).toBe(true);
  });

  it('only warns when the database or the export directory is missing', () => {
    expect(validateConfig({ exportDir: path.join(workDir, 'not-created-yet') })).toBe(true);
  });

  it('fails when the export directory is a file', async () => {
    const file = path.join(workDir, 'exports');
    await fs.writeFile(file, 'not a directory');

    expect(validateConfig({ databaseUrl: 'postgres://localhost/test', exportDir: file })).toBe(false);
  });
});
