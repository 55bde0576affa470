import { ClassifiedError, ErrorKind } from '../../domain/entities/DownloadTask';
import { AppError, FloodWaitError, NetworkError, PermissionError } from '../../shared/errors/AppError';

const NETWORK_MARKERS = ['connection', 'network'];
const PERMISSION_MARKERS = ['permission', 'access'];

/**
 * Map a raised fetch failure onto the retry taxonomy.
 *
 * Flood waits are recognised by a structured wait duration (`seconds` or
 * `retryAfter` on the error). Our own error types are trusted as they are,
 * since their messages carry URLs; only foreign errors are matched by
 * keywords. Anything unrecognised, including errors that cannot even be
 * stringified, is UNKNOWN.
 */
export function classifyError(rawError: unknown): ClassifiedError {
  try {
    const message = describe(rawError);

    const waitSeconds = extractWaitSeconds(rawError);
    if (waitSeconds !== undefined) {
      return { kind: ErrorKind.FLOOD_WAIT, waitSeconds, message };
    }

    if (rawError instanceof PermissionError) {
      return { kind: ErrorKind.PERMISSION, message };
    }
    if (rawError instanceof NetworkError) {
      return { kind: ErrorKind.NETWORK, message };
    }
    if (rawError instanceof AppError) {
      return { kind: ErrorKind.UNKNOWN, message };
    }

    const lowered = message.toLowerCase();
    if (NETWORK_MARKERS.some(marker => lowered.includes(marker))) {
      return { kind: ErrorKind.NETWORK, message };
    }
    if (PERMISSION_MARKERS.some(marker => lowered.includes(marker))) {
      return { kind: ErrorKind.PERMISSION, message };
    }

    return { kind: ErrorKind.UNKNOWN, message };
  } catch {
    return { kind: ErrorKind.UNKNOWN, message: 'Unclassifiable error' };
  }
}

function extractWaitSeconds(error: unknown): number | undefined {
  if (error instanceof FloodWaitError) {
    return error.seconds;
  }
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('seconds' in error && isWaitDuration(error.seconds)) {
    return error.seconds;
  }
  if ('retryAfter' in error && isWaitDuration(error.retryAfter)) {
    return error.retryAfter;
  }
  return undefined;
}

function isWaitDuration(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
