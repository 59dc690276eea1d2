import { config } from '../core/config';
import { logger } from '../core/logger';
import { Session, SessionEntity, Turn } from '../types';
import { NodeLabel } from '../types/graph';
import { KeyedMutex } from '../utils/keyed-mutex';
import { maskIdentifier } from '../utils/security';

export interface SessionMemoryOptions {
  ttlMs: number;
  maxTurns: number;
  sweepIntervalMs: number;
  now: () => number;
}

type PronounForm = 'subject' | 'possessive';

interface PronounRule {
  person: boolean;
  form: PronounForm;
}

const PRONOUNS: Record<string, PronounRule> = {
  he: { person: true, form: 'subject' },
  him: { person: true, form: 'subject' },
  his: { person: true, form: 'possessive' },
  she: { person: true, form: 'subject' },
  hers: { person: true, form: 'possessive' },
  it: { person: false, form: 'subject' },
  its: { person: false, form: 'possessive' },
};

// Generic nouns that can stand in for a named entity after "that" / "this" / "the same"
const GENERIC_NOUNS: Record<string, readonly NodeLabel[]> = {
  pump: ['Asset'],
  valve: ['Asset', 'Component'],
  motor: ['Asset', 'Component'],
  compressor: ['Asset'],
  machine: ['Asset'],
  equipment: ['Asset'],
  asset: ['Asset'],
  unit: ['Asset'],
  component: ['Component'],
  part: ['Component'],
  bearing: ['Component'],
  seal: ['Component'],
  person: ['Person'],
  technician: ['Person'],
  engineer: ['Person'],
  operator: ['Person'],
  role: ['Role'],
  team: ['Team'],
  crew: ['Team'],
  document: ['Document'],
  manual: ['Document'],
  procedure: ['Document'],
  location: ['Location'],
  site: ['Location'],
  area: ['Location'],
  building: ['Location'],
};

const PRONOUN_PATTERN = /\b(he|him|his|she|her|hers|it|its)\b/gi;
const DEMONSTRATIVE_PATTERN = new RegExp(
  `\\b(?:that|this|the same)\\s+(${Object.keys(GENERIC_NOUNS).join('|')})\\b`,
  'gi'
);

/**
 * Short-lived, in-process conversation memory. Sessions expire after a
 * period without access; the sweep timer removes the ones nobody asks for
 * again.
 */
export class SessionMemory {
  private sessions: Map<string, Session> = new Map();
  private locks = new KeyedMutex();
  private sweepTimer: NodeJS.Timeout | null = null;
  private options: SessionMemoryOptions;

  constructor(options: Partial<SessionMemoryOptions> = {}) {
    this.options = {
      ttlMs: options.ttlMs ?? config.session.ttlMs,
      maxTurns: options.maxTurns ?? config.session.maxTurns,
      sweepIntervalMs: options.sweepIntervalMs ?? config.session.sweepIntervalMs,
      now: options.now ?? Date.now,
    };
  }

  get(sessionId: string): Session | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;

    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      logger.debug('Session expired', { sessionId: maskIdentifier(sessionId) });
      return null;
    }

    session.lastAccessedAt = new Date(this.options.now());
    return this.snapshot(session);
  }

  append(sessionId: string, turn: Turn): Session {
    let session = this.sessions.get(sessionId);
    const now = new Date(this.options.now());

    if (!session || this.isExpired(session)) {
      session = { id: sessionId, turns: [], createdAt: now, lastAccessedAt: now };
      this.sessions.set(sessionId, session);
      logger.debug('Session created', { sessionId: maskIdentifier(sessionId) });
    }

    session.turns.push(turn);
    if (session.turns.length > this.options.maxTurns) {
      session.turns = session.turns.slice(-this.options.maxTurns);
    }
    session.lastAccessedAt = now;

    return this.snapshot(session);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Rewrites pronouns and demonstrative noun phrases into the most recently
   * mentioned compatible entity. Returns the query unchanged when nothing
   * can be resolved.
   */
  resolveReferences(query: string, session: Session | null): string {
    if (!session || session.turns.length === 0) {
      return query;
    }

    const recentFirst = [...session.turns].reverse();

    const withNouns = query.replace(DEMONSTRATIVE_PATTERN, (match: string, noun: string) => {
      const entity = this.findByNoun(recentFirst, noun.toLowerCase());
      return entity ? entity.name : match;
    });

    return withNouns.replace(PRONOUN_PATTERN, (match: string, pronoun: string, offset: number, whole: string) => {
      const word = pronoun.toLowerCase();
      const rule: PronounRule =
        word === 'her'
          ? { person: true, form: this.isPossessiveHer(whole, offset + match.length) ? 'possessive' : 'subject' }
          : PRONOUNS[word];

      const entity = this.findAntecedent(recentFirst, (candidate) =>
        rule.person ? candidate.kind === 'Person' : candidate.kind !== 'Person'
      );
      if (!entity) return match;

      return rule.form === 'possessive' ? `${entity.name}'s` : entity.name;
    });
  }

  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(sessionId, fn);
  }

  /** Removes expired sessions; returns how many were removed. */
  sweep(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session) && !this.locks.isLocked(id)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug('Session sweep', { removed, remaining: this.sessions.size });
    }
    return removed;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  size(): number {
    return this.sessions.size;
  }

  private isExpired(session: Session): boolean {
    return this.options.now() - session.lastAccessedAt.getTime() > this.options.ttlMs;
  }

  private snapshot(session: Session): Session {
    return { ...session, turns: [...session.turns] };
  }

  // "her" followed by a word is possessive ("her team"); before punctuation or at the end it is an object
  private isPossessiveHer(text: string, end: number): boolean {
    return /^\s+[A-Za-z0-9]/.test(text.slice(end));
  }

  private findAntecedent(
    turnsRecentFirst: Turn[],
    accept: (entity: SessionEntity) => boolean
  ): SessionEntity | undefined {
    for (const turn of turnsRecentFirst) {
      const found = turn.entities.find(accept);
      if (found) return found;
    }
    return undefined;
  }

  private findByNoun(turnsRecentFirst: Turn[], noun: string): SessionEntity | undefined {
    const kinds = GENERIC_NOUNS[noun] ?? [];
    const compatible = (entity: SessionEntity) => kinds.includes(entity.kind);

    return (
      this.findAntecedent(
        turnsRecentFirst,
        (entity) =>
          compatible(entity) &&
          ((entity.category ?? '').toLowerCase().includes(noun) || entity.name.toLowerCase().includes(noun))
      ) ?? this.findAntecedent(turnsRecentFirst, compatible)
    );
  }
}
