/**
 * Executable resolver unit tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import {
  resolveExecutable,
  resolveExecutableInEnvironment,
  isExecutableFile,
  lookupVariable,
} from '../../../src/executor/executable-resolver';
import { ExecutableNotFoundError } from '../../../src/errors';
import { makeTempDir, removeDir, writeFile } from '../../helpers/fixtures';

const posixOnly = process.platform === 'win32' ? describe.skip : describe;

function writeExecutable(dir: string, relativePath: string): string {
  const filePath = writeFile(dir, relativePath, '#!/bin/sh\nexit 0\n');
  fs.chmodSync(filePath, 0o755);
  return filePath;
}

posixOnly('resolveExecutable() on POSIX', () => {
  let testDir: string;
  let firstBin: string;
  let secondBin: string;

  beforeEach(() => {
    testDir = makeTempDir('resolver-');
    firstBin = path.join(testDir, 'first');
    secondBin = path.join(testDir, 'second');
    fs.mkdirSync(firstBin);
    fs.mkdirSync(secondBin);
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('should return the first match in search path order', () => {
    writeExecutable(testDir, 'first/tool');
    writeExecutable(testDir, 'second/tool');

    const resolved = resolveExecutable('tool', { searchPath: `${firstBin}:${secondBin}`, platform: 'linux' });
    assert.equal(resolved, path.join(firstBin, 'tool'));
  });

  it('should skip files that are not executable and directories', () => {
    writeFile(testDir, 'first/tool', 'not executable');
    fs.chmodSync(path.join(firstBin, 'tool'), 0o644);
    fs.mkdirSync(path.join(firstBin, 'dir-tool'));
    writeExecutable(testDir, 'second/tool');

    assert.equal(
      resolveExecutable('tool', { searchPath: `${firstBin}:${secondBin}`, platform: 'linux' }),
      path.join(secondBin, 'tool')
    );
    assert.throws(
      () => resolveExecutable('dir-tool', { searchPath: firstBin, platform: 'linux' }),
      ExecutableNotFoundError
    );
  });

  it('should raise ExecutableNotFoundError when nothing matches', () => {
    assert.throws(
      () => resolveExecutable('ghost', { searchPath: firstBin, platform: 'linux' }),
      (error: unknown) =>
        error instanceof ExecutableNotFoundError &&
        error.message === "[E201] Executable not found: 'ghost' not found in PATH"
    );
  });

  it('should search nothing when there is no search path', () => {
    assert.throws(() => resolveExecutable('sh', { platform: 'linux' }), ExecutableNotFoundError);
  });

  it('should accept an existing absolute path as given', () => {
    const tool = writeExecutable(testDir, 'first/tool');
    assert.equal(resolveExecutable(tool, { platform: 'linux' }), tool);
  });

  it('should resolve a path with a directory part against cwd', () => {
    writeExecutable(testDir, 'first/tool');
    assert.equal(resolveExecutable('./first/tool', { cwd: testDir, platform: 'linux' }), path.join(firstBin, 'tool'));
    assert.equal(resolveExecutable('first/tool', { cwd: testDir, platform: 'linux' }), path.join(firstBin, 'tool'));
  });

  it('should reject a path that does not exist', () => {
    const missing = path.join(testDir, 'nope', 'tool');
    assert.throws(
      () => resolveExecutable(missing, { platform: 'linux' }),
      (error: unknown) =>
        error instanceof ExecutableNotFoundError &&
        error.message === `[E201] Executable not found: '${missing}' does not exist (${missing})`
    );
  });

  it('should report executability through isExecutableFile', () => {
    const tool = writeExecutable(testDir, 'first/tool');
    const data = writeFile(testDir, 'first/data.txt', 'x');
    fs.chmodSync(data, 0o644);

    assert.equal(isExecutableFile(tool, 'linux'), true);
    assert.equal(isExecutableFile(data, 'linux'), false);
    assert.equal(isExecutableFile(firstBin, 'linux'), false);
    assert.equal(isExecutableFile(path.join(testDir, 'missing'), 'linux'), false);
  });
});

describe('resolveExecutable() with Windows rules', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir('resolver-win-');
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('should try each PATHEXT extension in order', () => {
    writeFile(testDir, 'tool.cmd', '@echo off');
    writeFile(testDir, 'tool.bat', '@echo off');

    const resolved = resolveExecutable('tool', { searchPath: testDir, pathExt: '.EXE;.CMD;.BAT', platform: 'win32' });
    assert.equal(resolved, path.join(testDir, 'tool.cmd'));
  });

  it('should not add extensions to a name that has one', () => {
    writeFile(testDir, 'tool.exe.cmd', '@echo off');
    assert.throws(
      () => resolveExecutable('tool.exe', { searchPath: testDir, pathExt: '.CMD', platform: 'win32' }),
      ExecutableNotFoundError
    );
  });
});

describe('resolveExecutableInEnvironment()', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir('resolver-env-');
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('should search the composed PATH, never the launcher PATH', () => {
    assert.throws(
      () => resolveExecutableInEnvironment(path.basename(process.execPath), {}),
      ExecutableNotFoundError
    );
  });

  it('should find a tool on the composed PATH', () => {
    const tool = writeFile(testDir, 'bin/tool.cmd', '@echo off');
    const env = { Path: path.join(testDir, 'bin'), PATHEXT: '.CMD' };

    assert.equal(resolveExecutableInEnvironment('tool', env, { platform: 'win32' }), tool);
  });
});

describe('lookupVariable()', () => {
  it('should match names exactly on POSIX and case-insensitively on win32', () => {
    const env = { Path: 'C:\\bin' };
    assert.equal(lookupVariable(env, 'PATH', 'linux'), undefined);
    assert.equal(lookupVariable(env, 'PATH', 'win32'), 'C:\\bin');
    assert.equal(lookupVariable(env, 'Path', 'linux'), 'C:\\bin');
  });

  it('should ignore inherited properties', () => {
    assert.equal(lookupVariable({}, 'constructor', 'linux'), undefined);
  });
});
