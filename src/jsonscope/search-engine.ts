/**
 * Search engine - literal, case-sensitive, non-overlapping matches
 *
 * Scanning is greedy left to right: after a match the next search starts at
 * the end of that match, so "aba" in "ababab" is found once. Offsets and
 * lengths are UTF-16 code units, the same units the text buffer uses.
 */

import { countOperation } from './debug.js';
import type { Match, SearchSession } from './types.js';

export function findMatches(text: string, pattern: string): Match[] {
  const matches: Match[] = [];
  if (pattern.length === 0) return matches;

  let from = 0;
  for (;;) {
    const start = text.indexOf(pattern, from);
    if (start === -1) break;
    matches.push({ start, length: pattern.length });
    from = start + pattern.length;
  }
  return matches;
}

export function search(text: string, pattern: string, version = 0): SearchSession {
  countOperation('searches');
  const matches = findMatches(text, pattern);
  return {
    pattern,
    matches,
    currentIndex: matches.length > 0 ? 0 : undefined,
    version,
  };
}

export function emptySession(version = 0): SearchSession {
  return { pattern: '', matches: [], currentIndex: undefined, version };
}

export function nextMatch(session: SearchSession): SearchSession {
  return step(session, 1);
}

export function prevMatch(session: SearchSession): SearchSession {
  return step(session, -1);
}

function step(session: SearchSession, delta: 1 | -1): SearchSession {
  const count = session.matches.length;
  if (count === 0 || session.currentIndex === undefined) return session;
  return {
    ...session,
    currentIndex: (session.currentIndex + delta + count) % count,
  };
}

export function currentMatch(session: SearchSession): Match | undefined {
  if (session.currentIndex === undefined) return undefined;
  return session.matches[session.currentIndex];
}

/** "3/7" style position, or "0/0" */
export function describePosition(session: SearchSession): string {
  if (session.currentIndex === undefined) return '0/0';
  return `${session.currentIndex + 1}/${session.matches.length}`;
}
