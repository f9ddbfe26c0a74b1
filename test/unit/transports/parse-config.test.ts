import assert from 'assert';
import { ZodError } from 'zod';
import { parseConfig } from '../../../src/transports/parse-config.ts';

describe('transports/parse-config', () => {
  describe('parseConfig()', () => {
    it('defaults to the cwd on port 8080', () => {
      const config = parseConfig([], {}, '/srv/site');

      assert.deepStrictEqual(config, {
        documentRoot: '/srv/site',
        port: 8080,
        defaultFile: 'index.html',
        chunkSize: 204800,
      });
    });

    it('resolves --root against the cwd', () => {
      const config = parseConfig(['--root=./public'], {}, '/srv/site');

      assert.strictEqual(config.documentRoot, '/srv/site/public');
    });

    it('keeps an absolute --root', () => {
      const config = parseConfig(['--root', '/var/www'], {}, '/srv/site');

      assert.strictEqual(config.documentRoot, '/var/www');
    });

    it('reads STATIC_ROOT and PORT from the environment', () => {
      const config = parseConfig([], { STATIC_ROOT: '/var/www', PORT: '3000' }, '/srv/site');

      assert.strictEqual(config.documentRoot, '/var/www');
      assert.strictEqual(config.port, 3000);
    });

    it('prefers CLI flags over environment variables', () => {
      const config = parseConfig(['--port=4567', '--root=/data'], { STATIC_ROOT: '/var/www', PORT: '3000' }, '/srv/site');

      assert.strictEqual(config.documentRoot, '/data');
      assert.strictEqual(config.port, 4567);
    });

    it('parses --index and --chunk-size', () => {
      const config = parseConfig(['--index=default.htm', '--chunk-size=65536'], {}, '/srv/site');

      assert.strictEqual(config.defaultFile, 'default.htm');
      assert.strictEqual(config.chunkSize, 65536);
    });

    it('accepts port 0 for an ephemeral port', () => {
      const config = parseConfig(['--port=0'], {}, '/srv/site');

      assert.strictEqual(config.port, 0);
    });

    it('rejects a non-numeric port', () => {
      assert.throws(() => parseConfig(['--port=http'], {}, '/srv/site'), ZodError);
    });

    it('rejects a port out of range', () => {
      assert.throws(() => parseConfig(['--port=70000'], {}, '/srv/site'), ZodError);
    });

    it('rejects a zero chunk size', () => {
      assert.throws(() => parseConfig(['--chunk-size=0'], {}, '/srv/site'), ZodError);
    });

    it('rejects unknown flags', () => {
      assert.throws(() => parseConfig(['--verbose'], {}, '/srv/site'), /Unknown option/);
    });
  });
});
