import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { z } from 'zod';
import {
  field,
  firstOf,
  isJsonObject,
  jsonArray,
  jsonObject,
  stringField,
} from '../src/core/fields';

describe('Field resolution', () => {
  describe('field()', () => {
    it('should read an own property of an object', () => {
      assert.equal(field({ a: 'x' }, 'a'), 'x');
    });

    it('should return undefined for a missing key', () => {
      assert.equal(field({ a: 'x' }, 'b'), undefined);
    });

    it('should return undefined for non-object containers', () => {
      assert.equal(field('text', 'length'), undefined);
      assert.equal(field(['a'], '0'), undefined);
      assert.equal(field(null, 'a'), undefined);
      assert.equal(field(undefined, 'a'), undefined);
    });

    it('should not see inherited properties', () => {
      assert.equal(field({}, 'constructor'), undefined);
      assert.equal(field({}, 'toString'), undefined);
    });

    it('should keep an explicit null', () => {
      assert.equal(field({ a: null }, 'a'), null);
    });
  });

  describe('firstOf()', () => {
    it('should return the first candidate that matches the schema', () => {
      const event = { tool_name: 'Read', tool: 'Write' };
      const name = firstOf(
        [
          [event, 'tool_name'],
          [event, 'tool'],
        ],
        z.string(),
      );
      assert.equal(name, 'Read');
    });

    it('should fall through to a later candidate when the first is absent', () => {
      const event = { tool: 'Write' };
      const name = firstOf(
        [
          [event, 'tool_name'],
          [event, 'tool'],
        ],
        z.string(),
      );
      assert.equal(name, 'Write');
    });

    it('should skip candidates of the wrong type', () => {
      const event = { tool_name: null, tool: 'Bash' };
      const name = firstOf(
        [
          [event, 'tool_name'],
          [event, 'tool'],
        ],
        z.string(),
      );
      assert.equal(name, 'Bash');
    });

    it('should return undefined when nothing matches', () => {
      assert.equal(firstOf([[{ a: 1 }, 'a']], z.string()), undefined);
      assert.equal(firstOf([], z.string()), undefined);
    });

    it('should distinguish objects from arrays', () => {
      const event = { tool_input: ['x'], args: { file_path: '/f' } };
      const input = firstOf(
        [
          [event, 'tool_input'],
          [event, 'args'],
        ],
        jsonObject,
      );
      assert.deepEqual(input, { file_path: '/f' });
      assert.deepEqual(firstOf([[event, 'tool_input']], jsonArray), ['x']);
      assert.equal(firstOf([[event, 'args']], jsonArray), undefined);
    });
  });

  describe('stringField()', () => {
    it('should return strings and ignore other types', () => {
      assert.equal(stringField({ a: 'x' }, 'a'), 'x');
      assert.equal(stringField({ a: 1 }, 'a'), undefined);
      assert.equal(stringField({ a: true }, 'a'), undefined);
    });

    it('should keep empty strings', () => {
      assert.equal(stringField({ a: '' }, 'a'), '');
    });
  });

  describe('isJsonObject()', () => {
    it('should accept plain objects only', () => {
      assert.equal(isJsonObject({}), true);
      assert.equal(isJsonObject([]), false);
      assert.equal(isJsonObject(null), false);
      assert.equal(isJsonObject('x'), false);
    });
  });
});
