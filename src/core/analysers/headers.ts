import * as path from 'path';
import { lookup } from 'mime-types';
import { CacheVisibility, HeaderName, ObjectHandle } from '../../types';
import { HeaderAnalyser } from '../analyser';
import { Logger, defaultLogger } from '../logger';

/**
 * MIME type for the key's file extension, or undefined when there is none or it is unknown
 */
export function inferContentType(key: string): string | undefined {
  const extension = path.posix.extname(key);
  if (!extension) return undefined;
  const type = lookup(extension);
  return type === false ? undefined : type;
}

/**
 * "public, max-age=604800", or "public, no-cache" for a negative max-age
 */
export function buildCacheControl(maxAge: number, visibility: CacheVisibility): string {
  return maxAge >= 0 ? `${visibility}, max-age=${maxAge}` : `${visibility}, no-cache`;
}

/**
 * Checks Content-Type against the key's extension
 */
export class ContentTypeAnalyser extends HeaderAnalyser {
  readonly header: HeaderName = 'contentType';

  desiredValue(handle: ObjectHandle): string | undefined {
    return inferContentType(handle.key);
  }
}

/**
 * Checks Cache-Control against a fixed directive
 */
export class CacheControlAnalyser extends HeaderAnalyser {
  readonly header: HeaderName = 'cacheControl';
  readonly cacheControl: string;

  constructor(
    name: string,
    maxAge: number,
    visibility: CacheVisibility = CacheVisibility.Public,
    logger: Logger = defaultLogger
  ) {
    super(name, logger);
    this.cacheControl = buildCacheControl(maxAge, visibility);
  }

  desiredValue(): string {
    return this.cacheControl;
  }
}
