import { describe, it, expect } from 'vitest';
import { BufferSource } from '../../../src/infrastructure/sources/BufferSource.js';
import { ConfigurationInvalidError, DecodeFailureError } from '../../../src/domain/model/ReportError.js';
import { collect } from '../../helpers/records.js';

describe('BufferSource', () => {
  describe('read()', () => {
    it('should yield string content as is', async () => {
      const source = new BufferSource('name,age\nAlice,30\n');

      expect(await collect(source.read())).toEqual(['name,age\nAlice,30\n']);
    });

    it('should decode UTF-8 bytes', async () => {
      const source = new BufferSource(Buffer.from('name\nJosé\n', 'utf-8'));

      expect((await collect(source.read())).join('')).toBe('name\nJosé\n');
    });

    it('should decode with the configured encoding', async () => {
      const source = new BufferSource(Uint8Array.from([0x63, 0x61, 0x66, 0xe9]), { encoding: 'latin1' });

      expect((await collect(source.read())).join('')).toBe('café');
    });

    it('should drop a leading byte order mark', async () => {
      const source = new BufferSource(Uint8Array.from([0xef, 0xbb, 0xbf, 0x61, 0x2c, 0x62]));

      expect((await collect(source.read())).join('')).toBe('a,b');
    });

    it('should be readable more than once', async () => {
      const source = new BufferSource('a,b\n');

      expect(await collect(source.read())).toEqual(await collect(source.read()));
    });

    it('should fail with DecodeFailureError on invalid bytes', async () => {
      const bytes = Uint8Array.from([0x61, 0x2c, 0xff, 0x0a]);

      await expect(collect(new BufferSource(bytes).read())).rejects.toThrow(DecodeFailureError);
      await expect(collect(new BufferSource(bytes).read())).rejects.toThrow('Input is not valid utf-8 text');
    });
  });

  describe('constructor', () => {
    it('should reject an unknown encoding', () => {
      expect(() => new BufferSource('a', { encoding: 'klingon' })).toThrow(ConfigurationInvalidError);
      expect(() => new BufferSource('a', { encoding: 'klingon' })).toThrow("Unsupported encoding 'klingon'");
    });
  });

  describe('metadata()', () => {
    it('should report name, byte size and canonical encoding', () => {
      const source = new BufferSource('é', { fileName: 'upload.csv', encoding: 'UTF8' });

      expect(source.metadata()).toEqual({ fileName: 'upload.csv', fileSize: 2, encoding: 'utf-8' });
    });

    it('should default the file name', () => {
      expect(new BufferSource('').metadata().fileName).toBe('buffer-input');
    });
  });
});
