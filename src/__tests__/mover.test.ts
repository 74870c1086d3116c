/** @jest-environment node */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { moveFile, nextFreePath } from '../main/mover';

const errnoError = (message: string, code: string) =>
  Object.assign(new Error(message), { code });

const exists = (targetPath: string) =>
  fs.access(targetPath).then(
    () => true,
    () => false,
  );

describe('moveFile', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'mover-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('renames within the same filesystem', async () => {
    const source = path.join(workspace, 'a.txt');
    const target = path.join(workspace, 'out.txt');
    await fs.writeFile(source, 'alpha');

    const outcome = await moveFile(source, target);

    expect(outcome).toEqual({ status: 'moved', targetPath: target, method: 'rename' });
    expect(await exists(source)).toBe(false);
    expect(await fs.readFile(target, 'utf8')).toBe('alpha');
  });

  it('overwrites an existing target by default', async () => {
    const source = path.join(workspace, 'a.txt');
    const target = path.join(workspace, 'b.txt');
    await fs.writeFile(source, 'new');
    await fs.writeFile(target, 'old');

    await moveFile(source, target);

    expect(await fs.readFile(target, 'utf8')).toBe('new');
  });

  it('leaves the source alone under the skip policy', async () => {
    const source = path.join(workspace, 'a.txt');
    const target = path.join(workspace, 'b.txt');
    await fs.writeFile(source, 'new');
    await fs.writeFile(target, 'old');

    const outcome = await moveFile(source, target, 'skip');

    expect(outcome).toEqual({ status: 'skipped', targetPath: target, message: 'target already exists' });
    expect(await fs.readFile(source, 'utf8')).toBe('new');
    expect(await fs.readFile(target, 'utf8')).toBe('old');
  });

  it('picks the next free name under the rename policy', async () => {
    const target = path.join(workspace, 'b.txt');
    await fs.writeFile(target, 'old');
    await fs.writeFile(path.join(workspace, 'b (1).txt'), 'older');
    const source = path.join(workspace, 'a.txt');
    await fs.writeFile(source, 'new');

    const outcome = await moveFile(source, target, 'rename');

    const expected = path.join(workspace, 'b (2).txt');
    expect(outcome).toEqual({ status: 'moved', targetPath: expected, method: 'rename' });
    expect(await fs.readFile(expected, 'utf8')).toBe('new');
    expect(await fs.readFile(target, 'utf8')).toBe('old');
  });

  it('numbers extensionless names after the stem', async () => {
    await fs.writeFile(path.join(workspace, 'LICENSE'), 'x');
    expect(await nextFreePath(path.join(workspace, 'LICENSE'))).toBe(
      path.join(workspace, 'LICENSE (1)'),
    );
  });

  it('copies and unlinks when rename crosses devices', async () => {
    const source = path.join(workspace, 'a.bin');
    const target = path.join(workspace, 'moved.bin');
    await fs.writeFile(source, 'payload');
    jest.spyOn(fs, 'rename').mockRejectedValueOnce(errnoError('cross-device link', 'EXDEV'));

    const outcome = await moveFile(source, target);

    expect(outcome).toEqual({ status: 'moved', targetPath: target, method: 'copy' });
    expect(await exists(source)).toBe(false);
    expect(await fs.readFile(target, 'utf8')).toBe('payload');
  });

  it('keeps timestamps when copying across devices', async () => {
    const source = path.join(workspace, 'old.bin');
    const target = path.join(workspace, 'moved.bin');
    const stamp = new Date('2001-02-03T04:05:06.000Z');
    await fs.writeFile(source, 'payload');
    await fs.utimes(source, stamp, stamp);
    jest.spyOn(fs, 'rename').mockRejectedValueOnce(errnoError('cross-device link', 'EXDEV'));

    await moveFile(source, target);

    const stats = await fs.stat(target);
    expect(stats.mtime.toISOString()).toBe('2001-02-03T04:05:06.000Z');
    expect(stats.atime.toISOString()).toBe('2001-02-03T04:05:06.000Z');
  });

  it('recreates symlinks instead of copying their target across devices', async () => {
    const real = path.join(workspace, 'real.txt');
    const link = path.join(workspace, 'link.txt');
    const target = path.join(workspace, 'moved-link.txt');
    await fs.writeFile(real, 'contents');
    await fs.symlink('real.txt', link);
    jest.spyOn(fs, 'rename').mockRejectedValueOnce(errnoError('cross-device link', 'EXDEV'));

    const outcome = await moveFile(link, target);

    expect(outcome).toEqual({ status: 'moved', targetPath: target, method: 'copy' });
    expect((await fs.lstat(target)).isSymbolicLink()).toBe(true);
    expect(await fs.readlink(target)).toBe('real.txt');
    await expect(fs.lstat(link)).rejects.toMatchObject({ code: 'ENOENT' });
    expect(await fs.readFile(real, 'utf8')).toBe('contents');
  });

  it('removes the copy when the source cannot be unlinked', async () => {
    const source = path.join(workspace, 'a.bin');
    const target = path.join(workspace, 'moved.bin');
    await fs.writeFile(source, 'payload');
    jest.spyOn(fs, 'rename').mockRejectedValueOnce(errnoError('cross-device link', 'EXDEV'));
    jest.spyOn(fs, 'unlink').mockRejectedValueOnce(errnoError('permission denied', 'EACCES'));

    await expect(moveFile(source, target)).rejects.toMatchObject({ code: 'EACCES' });
    expect(await fs.readFile(source, 'utf8')).toBe('payload');
    expect(await exists(target)).toBe(false);
  });

  it('propagates errors other than cross-device renames', async () => {
    const source = path.join(workspace, 'missing.txt');
    await expect(moveFile(source, path.join(workspace, 'x.txt'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
