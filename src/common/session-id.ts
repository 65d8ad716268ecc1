import { BadRequestException } from '@nestjs/common';

/** Width of the `user_profiles.id` column. */
export const MAX_SESSION_ID_LENGTH = 128;

/** Trimmed id, or null when the value is not a usable session id. */
export function normalizeSessionId(sessionId: unknown): string | null {
  if (typeof sessionId !== 'string') {
    return null;
  }
  const trimmed = sessionId.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_SESSION_ID_LENGTH ? trimmed : null;
}

export function requireSessionId(sessionId: unknown): string {
  if (typeof sessionId === 'string' && sessionId.trim().length > MAX_SESSION_ID_LENGTH) {
    throw new BadRequestException(`session_id must be at most ${MAX_SESSION_ID_LENGTH} characters`);
  }
  const normalized = normalizeSessionId(sessionId);
  if (normalized === null) {
    throw new BadRequestException('session_id is required');
  }
  return normalized;
}
