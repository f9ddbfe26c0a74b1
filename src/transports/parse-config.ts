import { resolve } from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import { staticFileOptionsSchema } from '../file-serving/config.ts';

const DEFAULT_PORT = 8080;

const serverConfigSchema = staticFileOptionsSchema.extend({
  documentRoot: z.string().min(1),
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
});

/**
 * Parsed server configuration returned by parseConfig()
 */
export type ParsedServerConfig = z.infer<typeof serverConfigSchema>;

/**
 * Parse server configuration from CLI arguments and environment variables.
 *
 * - `--root` / STATIC_ROOT: document root (default: cwd), resolved to an absolute path
 * - `--port` / PORT: listening port (default: 8080)
 * - `--index`: filename appended to paths ending in '/'
 * - `--chunk-size`: bytes per streamed chunk
 *
 * CLI flags override environment variables.
 *
 * @param args - CLI arguments array (REQUIRED - no default, typically process.argv.slice(2))
 * @param env - Environment variables object (REQUIRED - no default, typically process.env)
 * @param cwd - Base for a relative document root
 * @throws ZodError when a value is out of range or not numeric
 *
 * @example
 * parseConfig(['--root=./public', '--port=3000'], {}, '/home/me/site')
 * // => { documentRoot: '/home/me/site/public', port: 3000, defaultFile: 'index.html', chunkSize: 204800 }
 */
export function parseConfig(args: string[], env: Record<string, string | undefined>, cwd: string = process.cwd()): ParsedServerConfig {
  const { values } = parseArgs({
    args,
    options: {
      root: { type: 'string' },
      port: { type: 'string' },
      index: { type: 'string' },
      'chunk-size': { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  const root = values.root ?? env.STATIC_ROOT ?? cwd;
  const port = values.port ?? env.PORT;
  const chunkSize = values['chunk-size'];

  return serverConfigSchema.parse({
    documentRoot: resolve(cwd, root),
    port: port === undefined ? undefined : Number(port),
    defaultFile: values.index,
    chunkSize: chunkSize === undefined ? undefined : Number(chunkSize),
  });
}
