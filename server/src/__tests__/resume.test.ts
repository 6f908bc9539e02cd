import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { RESUME_LOAD_ERROR, RESUME_NOT_AVAILABLE, loadResume } from '../lib/resume.js';

describe('loadResume', () => {
  let dir = '';

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'resume-test-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the file verbatim', async () => {
    const file = path.join(dir, 'resume.txt');
    await writeFile(file, 'Jordan Lee\nStaff Engineer\n', 'utf-8');

    expect(await loadResume(file)).toEqual({ text: 'Jordan Lee\nStaff Engineer\n', loaded: true });
  });

  it('substitutes a placeholder for a missing file', async () => {
    expect(await loadResume(path.join(dir, 'missing.txt'))).toEqual({ text: RESUME_NOT_AVAILABLE, loaded: false });
  });

  it('substitutes an error placeholder when the path is unreadable', async () => {
    expect(await loadResume(dir)).toEqual({ text: RESUME_LOAD_ERROR, loaded: false });
  });
});
