import type { Content } from '@google/genai';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';

import { AnalysisError, AnalysisValidationError } from '@libs/exceptions';
import { isPlainObject, safeJsonParseFromText } from '@libs/utils';

import { BrandAnalysisDTO } from '../dto';
import { BrandAnalysis } from '../interfaces';

export const VIDEO_MIME_TYPE = 'video/mp4';

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/**
 * One user turn: the instruction text followed by the stored video.
 */
export function buildAnalysisContents(
  instruction: string,
  fileUri: string,
): Content[] {
  return [
    {
      role: 'user',
      parts: [
        { text: instruction },
        { fileData: { mimeType: VIDEO_MIME_TYPE, fileUri } },
      ],
    },
  ];
}

/**
 * Accepts either an already structured object or the JSON text of one.
 *
 * @throws {AnalysisError} with reason `parse` for anything else.
 */
export function parseAnalysisPayload(payload: unknown): Record<string, unknown> {
  if (isPlainObject(payload)) {
    return payload;
  }

  if (typeof payload === 'string') {
    const parsed = safeJsonParseFromText(payload, 'object');
    if (isPlainObject(parsed)) {
      return parsed;
    }
    throw new AnalysisError('Failed to parse JSON response', 'parse');
  }

  throw new AnalysisError(
    `Unexpected analysis payload of type ${payload === null ? 'null' : typeof payload}`,
    'parse',
  );
}

function collectIssues(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = error.constraints
      ? [`${path}: ${Object.values(error.constraints).join(', ')}`]
      : [];
    return [...own, ...collectIssues(error.children ?? [], path)];
  });
}

/**
 * Checks the parsed object against the response schema and drops keys the
 * schema does not know.
 *
 * @throws {AnalysisValidationError} listing every failing property path.
 */
export async function validateBrandAnalysis(
  plain: Record<string, unknown>,
): Promise<BrandAnalysis> {
  const dto = plainToInstance(BrandAnalysisDTO, plain);
  const errors = await validate(dto, { whitelist: true });

  if (errors.length > 0) {
    throw new AnalysisValidationError(collectIssues(errors));
  }

  return dto;
}

function readStatus(error: unknown): number | undefined {
  return typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
    ? error.status
    : undefined;
}

function readNetworkCode(error: unknown): string | undefined {
  let current: unknown = error;

  for (let depth = 0; depth < 3; depth += 1) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    if (
      'code' in current &&
      typeof current.code === 'string' &&
      NETWORK_ERROR_CODES.has(current.code)
    ) {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }

  return undefined;
}

/**
 * Maps whatever the model client threw onto an `AnalysisError`.
 */
export function toAnalysisError(error: unknown): AnalysisError {
  if (error instanceof AnalysisError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);
  const message = `Error analyzing brand compatibility: ${detail}`;
  const status = readStatus(error);

  if (status === 429 || /RESOURCE_EXHAUSTED|quota/i.test(detail)) {
    return new AnalysisError(message, 'quota', { cause: error });
  }

  if (status === 401 || status === 403 || /PERMISSION_DENIED/i.test(detail)) {
    return new AnalysisError(message, 'permission', { cause: error });
  }

  if (readNetworkCode(error) || /fetch failed/i.test(detail)) {
    return new AnalysisError(message, 'unreachable', { cause: error });
  }

  return new AnalysisError(message, 'endpoint', { cause: error });
}
