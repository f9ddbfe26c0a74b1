import * as path from 'path';
import { createErrorBranch, type ErrorBranch } from '../types.ts';
import { FileResource } from './file-resource.ts';
import type { FileSystem } from './types.ts';

export type ResolveResult = { type: 'success'; file: FileResource; requestPath: string } | (ErrorBranch<'NOT_FOUND' | 'OPEN_FAILURE'> & { requestPath: string });

/**
 * Normalise a request path against the document root
 *
 * A trailing separator gets the default filename appended, and `..` segments are folded
 * so the result never climbs above '/'.
 *
 * @example
 * resolveRequestPath('/docs/', 'index.html')
 * // => '/docs/index.html'
 *
 * @example
 * resolveRequestPath('/a/../../etc/passwd', 'index.html')
 * // => '/etc/passwd' (still relative to the document root)
 */
export function resolveRequestPath(requestPath: string, defaultFile: string): string {
  let rooted = requestPath.startsWith('/') ? requestPath : `/${requestPath}`;
  if (rooted.endsWith('/')) {
    rooted += defaultFile;
  }
  return path.posix.normalize(rooted);
}

export function resolveFilePath(documentRoot: string, requestPath: string): string {
  return path.join(path.resolve(documentRoot), requestPath);
}

/**
 * Map a request path onto an open file under the document root.
 *
 * Missing paths and anything that is not a regular file are NOT_FOUND; files that exist
 * but cannot be opened are OPEN_FAILURE with the underlying cause. The error messages name
 * only the request path, never the filesystem location.
 */
export async function resolveFile(fileSystem: FileSystem, documentRoot: string, rawPath: string, defaultFile: string): Promise<ResolveResult> {
  const requestPath = resolveRequestPath(rawPath, defaultFile);
  const filePath = resolveFilePath(documentRoot, requestPath);

  if (!(await fileSystem.exists(filePath))) {
    return { ...createErrorBranch('NOT_FOUND', `The file ${requestPath} was not found.`), requestPath };
  }

  let opened: Awaited<ReturnType<typeof FileResource.open>>;
  try {
    opened = await FileResource.open(fileSystem, filePath);
  } catch (error) {
    return { ...createErrorBranch('OPEN_FAILURE', `The file ${requestPath} could not be opened.`, error), requestPath };
  }

  if (!opened.isFile) {
    await opened.file.close();
    return { ...createErrorBranch('NOT_FOUND', `The file ${requestPath} was not found.`), requestPath };
  }

  return { type: 'success', file: opened.file, requestPath };
}
