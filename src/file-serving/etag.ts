import { createHash } from 'crypto';

/**
 * Compute the ETag for a file from its path and modification time
 *
 * SHA-1 over the UTF-8 bytes of `path + mtime in milliseconds`, rendered as 40 lowercase hex
 * characters. The same value is sent in the ETag header and compared against If-None-Match,
 * so both call sites must go through this function.
 *
 * @example
 * computeETag('/srv/www/index.html', new Date(1700000000000))
 * // => sha1('/srv/www/index.html1700000000000') as hex
 */
export function computeETag(filePath: string, mtime: Date): string {
  return createHash('sha1').update(`${filePath}${mtime.getTime()}`, 'utf8').digest('hex');
}
