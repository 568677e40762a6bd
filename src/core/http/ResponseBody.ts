// src/core/http/ResponseBody.ts

import type { Logger } from '../../observability/Logger';
import type { ResponseBody } from './types';

/**
 * Turn response bytes into a tagged body.
 *
 * - declared JSON: parsed, or `raw` when the bytes do not parse
 * - declared form-urlencoded: parsed into a flat record
 * - anything else: parsed as JSON when possible, `raw` otherwise
 */
export function decodeBody(
  bytes: Buffer,
  contentType: string | undefined,
  logger?: Logger
): ResponseBody {
  if (bytes.length === 0) {
    return { kind: 'empty' };
  }

  const type = contentType?.toLowerCase() ?? '';

  if (type.includes('application/x-www-form-urlencoded')) {
    return { kind: 'form', value: Object.fromEntries(new URLSearchParams(bytes.toString('utf8'))) };
  }

  const declaredJson = type.includes('json');
  if (!declaredJson) {
    logger?.debug('Response content type is not declared as JSON', { contentType });
  }

  try {
    return { kind: 'json', value: JSON.parse(bytes.toString('utf8')) };
  } catch {
    if (declaredJson) {
      logger?.warn('Response declared as JSON but failed to parse', { contentType });
    }
    return { kind: 'raw', bytes, contentType };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
