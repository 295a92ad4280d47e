import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { AtomicFileWriter } from '@/utils/atomicFile.js';

void describe('AtomicFileWriter contract', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'atomic-writer-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  void it('replaces the target without leaving temporary artifacts', async () => {
    const filePath = path.join(tmpDir, 'settings.json');
    fs.writeFileSync(filePath, 'old');

    await AtomicFileWriter.writeAsync(filePath, 'new payload');

    assert.equal(fs.readFileSync(filePath, 'utf-8'), 'new payload');
    assert.deepEqual(fs.readdirSync(tmpDir), ['settings.json']);
  });

  void it('supports concurrent async writes to the same target file', async () => {
    const filePath = path.join(tmpDir, 'async.json');
    const payloads = ['first payload', 'second payload', 'third payload'];

    await Promise.all(payloads.map((payload) => AtomicFileWriter.writeAsync(filePath, payload)));

    const finalContent = fs.readFileSync(filePath, 'utf-8');
    assert(
      payloads.includes(finalContent),
      `Final content "${finalContent}" should match one of the concurrent writes`
    );

    const tempArtifacts = fs.readdirSync(tmpDir).filter((file) => file.startsWith('async.json.'));
    assert.equal(
      tempArtifacts.length,
      0,
      `Expected concurrent writes to clean up temp files, found: ${tempArtifacts.join(', ')}`
    );
  });

  void it('applies the requested file mode', async () => {
    if (process.platform === 'win32') {
      return;
    }
    const filePath = path.join(tmpDir, 'secret.json');

    await AtomicFileWriter.writeAsync(filePath, '{}', { mode: 0o600 });

    assert.equal(fs.statSync(filePath).mode & 0o777, 0o600);
  });

  void it('cleans up temporary file when rename fails', async () => {
    const blockedPath = path.join(tmpDir, 'cannot-overwrite');
    fs.mkdirSync(blockedPath);

    await assert.rejects(
      AtomicFileWriter.writeAsync(blockedPath, 'payload'),
      /EISDIR|is a directory/
    );

    const tempArtifacts = fs
      .readdirSync(tmpDir)
      .filter((file) => file.startsWith('cannot-overwrite.'));
    assert.equal(tempArtifacts.length, 0, 'Temporary file should be removed when rename fails');
    assert.equal(
      fs.existsSync(blockedPath),
      true,
      'Original directory should remain intact after failure'
    );
  });
});
