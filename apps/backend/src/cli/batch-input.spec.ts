import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { BadRequestError, NotFoundError } from '../common/errors';
import { parseBatchArguments, readBatchInput } from './batch-input';

describe('batch input', () => {
  describe('parseBatchArguments', () => {
    it('should use the configured format without a flag', () => {
      expect(parseBatchArguments(['items.json'], 'json')).toEqual({
        inputPath: resolve('items.json'),
        format: 'json',
      });
    });

    it('should let the format flag override the configured format', () => {
      expect(parseBatchArguments(['--format=csv', 'items.json'], 'json')).toEqual({
        inputPath: resolve('items.json'),
        format: 'csv',
      });
    });

    it('should require an input path', () => {
      expect(() => parseBatchArguments(['--format=csv'], 'json')).toThrow(BadRequestError);
    });
  });

  describe('readBatchInput', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'batch-input-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should parse the JSON document', () => {
      const path = join(dir, 'items.json');
      writeFileSync(path, '[{"contentId":"lesson-1"}]');

      expect(readBatchInput(path)).toEqual([{ contentId: 'lesson-1' }]);
    });

    it('should report a missing file', () => {
      const path = join(dir, 'missing.json');

      expect(() => readBatchInput(path)).toThrow(NotFoundError);
      expect(() => readBatchInput(path)).toThrow(`Not found: input file ${path}`);
    });

    it('should report malformed JSON', () => {
      const path = join(dir, 'broken.json');
      writeFileSync(path, '[{"contentId":');

      expect(() => readBatchInput(path)).toThrow(BadRequestError);
    });
  });
});
