/**
 * Session Guard
 * The portal answers an expired session with its logged-out page instead of
 * the gradebook, so the page text is checked before anything is parsed.
 */

export const SESSION_EXPIRED_MARKER = 'Your session has expired and you have been logged out.';

export function isSessionExpired(rawHtml: string): boolean {
  return rawHtml.includes(SESSION_EXPIRED_MARKER);
}
