import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { exportFileName, saveToFile } from '../utils/fileWriter';

describe('exportFileName', () => {
  it('joins the category and log id', () => {
    expect(exportFileName('Swim', 123)).toBe('Swim-123.tcx');
  });

  it('replaces characters that are not valid in file names', () => {
    expect(exportFileName('Run/Walk: "easy"', 7)).toBe('Run-Walk- -easy--7.tcx');
  });
});

describe('saveToFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tcx-bridge-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates missing directories and returns the path', async () => {
    const target = path.join(dir, 'nested', 'Swim-1.tcx');
    await expect(saveToFile(target, '<x/>\n')).resolves.toBe(target);
    await expect(fs.readFile(target, 'utf-8')).resolves.toBe('<x/>\n');
  });

  it('overwrites an existing file', async () => {
    const target = path.join(dir, 'Swim-1.tcx');
    await saveToFile(target, 'old');
    await saveToFile(target, 'new');
    await expect(fs.readFile(target, 'utf-8')).resolves.toBe('new');
  });

  it('reports write failures', async () => {
    const blocker = path.join(dir, 'file');
    await fs.writeFile(blocker, '');
    const target = path.join(blocker, 'Swim-1.tcx');
    await expect(saveToFile(target, 'x')).rejects.toMatchObject({ code: 'PERSISTENCE' });
  });
});
