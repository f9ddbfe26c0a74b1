#!/usr/bin/env node
/**
 * Serve a directory over HTTP
 *
 * USAGE: tsx src/cli.ts --root ./public --port 8080 [--index index.html] [--chunk-size 204800]
 */

import { connectHttp } from './transports/http.ts';
import { parseConfig } from './transports/parse-config.ts';
import type { Logger } from './types.ts';

const logger: Logger = console;

async function main() {
  const { documentRoot, port, defaultFile, chunkSize } = parseConfig(process.argv.slice(2), process.env);

  const { close } = await connectHttp({ logger, documentRoot, port, handler: { defaultFile, chunkSize } });

  const shutdown = async () => {
    await close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
