import { describe, it, after } from 'node:test';
import * as assert from 'node:assert/strict';
import * as path from 'node:path';
import * as fs from 'node:fs';
import * as os from 'node:os';
import { writeActiveTask } from '../src/core/active-task';

const TEST_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'tool-activity-task-test-'));

describe('Active task writer', () => {
  after(() => {
    try {
      fs.rmSync(TEST_DIR, { recursive: true });
    } catch {
      // cleanup best-effort
    }
  });

  it('should create the file with the exact text', () => {
    const file = path.join(TEST_DIR, 'task');
    assert.equal(writeActiveTask(file, 'Write tests'), true);
    assert.equal(fs.readFileSync(file, 'utf-8'), 'Write tests');
  });

  it('should truncate longer previous content', () => {
    const file = path.join(TEST_DIR, 'task-truncate');
    fs.writeFileSync(file, 'a much longer previous task description', 'utf-8');
    assert.equal(writeActiveTask(file, 'short'), true);
    assert.equal(fs.readFileSync(file, 'utf-8'), 'short');
  });

  it('should keep multi-byte text intact', () => {
    const file = path.join(TEST_DIR, 'task-utf8');
    writeActiveTask(file, 'Überprüfen → done');
    assert.equal(fs.readFileSync(file, 'utf-8'), 'Überprüfen → done');
  });

  it('should return false instead of throwing when the directory is missing', () => {
    const file = path.join(TEST_DIR, 'no', 'such', 'dir', 'task');
    assert.equal(writeActiveTask(file, 'x'), false);
    assert.equal(fs.existsSync(file), false);
  });

  it('should return false when the path is a directory', () => {
    assert.equal(writeActiveTask(TEST_DIR, 'x'), false);
  });
});
