/**
 * Team Registry
 *
 * Resolves team codes, nicknames and partial names to canonical team names
 * for one sport. Upstream titles are not controlled, so unresolved input
 * returns `null` and callers keep the raw string.
 */

import { DataValidationError } from '../errors/index.js';

export interface TeamEntry {
  /** Canonical full name, e.g. "Minnesota Vikings" */
  name: string;
  /** Primary abbreviation, e.g. "MIN" */
  abbr: string;
  /** Other known spellings: city, nickname, alternate codes */
  variations: string[];
}

/** "<away> at <home>" headlines, optionally ending in "Winner?" */
const MATCHUP_PATTERN = /^(.+?)\s+(at|vs\.?|@)\s+(.+?)(\s+winner\??)?$/i;

const TEAM_CODE_PATTERN = /^[A-Z]{2,3}$/;

/** Shortest variation the whole-word heuristic will consider; codes are shorter */
const MIN_WORD_VARIANT_LENGTH = 4;

/** Shortest input the canonical-name containment heuristic will consider */
const MIN_PARTIAL_LENGTH = 3;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsWord(haystack: string, needle: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(needle)}($|[^a-z0-9])`).test(haystack);
}

export class TeamRegistry {
  /** lower-cased variant -> canonical name */
  private readonly byVariant = new Map<string, string>();

  /** upper-case ticker code -> canonical name */
  private readonly byCode = new Map<string, string>();

  private readonly abbrByName = new Map<string, string>();

  constructor(
    public readonly sport: string,
    private readonly entries: readonly TeamEntry[]
  ) {
    for (const entry of entries) {
      this.abbrByName.set(entry.name, entry.abbr);

      for (const variant of [entry.name, entry.abbr, ...entry.variations]) {
        this.register(variant, entry.name);
        if (TEAM_CODE_PATTERN.test(variant)) {
          this.byCode.set(variant, entry.name);
        }
      }
    }
  }

  private register(variant: string, canonical: string): void {
    const key = variant.trim().toLowerCase();
    const existing = this.byVariant.get(key);
    if (existing && existing !== canonical) {
      throw new DataValidationError(
        `Team variant "${variant}" maps to both "${existing}" and "${canonical}"`,
        'teams',
        { sport: this.sport }
      );
    }
    this.byVariant.set(key, canonical);
  }

  get teams(): readonly TeamEntry[] {
    return this.entries;
  }

  /** Whether `code` is a known ticker code for this sport */
  hasCode(code: string): boolean {
    return this.byCode.has(code);
  }

  resolveCode(code: string): string | null {
    return this.byCode.get(code.toUpperCase()) ?? null;
  }

  codeFor(name: string): string | null {
    return this.abbrByName.get(name) ?? null;
  }

  /**
   * Resolve any spelling of a team to its canonical name.
   *
   * Exact (case-insensitive) match first, then:
   * 1. the input contains a canonical name (longest wins),
   * 2. a canonical name contains the input, when exactly one does,
   * 3. the input contains a known variation as a word, when exactly one team matches.
   */
  resolve(variant: string): string | null {
    const query = variant.trim().toLowerCase();
    if (!query) return null;

    const exact = this.byVariant.get(query);
    if (exact) return exact;

    let longest: string | null = null;
    for (const { name } of this.entries) {
      if (containsWord(query, name.toLowerCase()) && (!longest || name.length > longest.length)) {
        longest = name;
      }
    }
    if (longest) return longest;

    if (query.length >= MIN_PARTIAL_LENGTH) {
      const partial = this.entries.filter(({ name }) => name.toLowerCase().includes(query));
      if (partial.length === 1) return partial[0].name;
    }

    const candidates = new Set<string>();
    for (const [key, canonical] of this.byVariant) {
      if (key.length >= MIN_WORD_VARIANT_LENGTH && containsWord(query, key)) {
        candidates.add(canonical);
      }
    }
    if (candidates.size === 1) {
      const [only] = candidates;
      return only;
    }

    return null;
  }

  /**
   * Rewrite partial team names in a market title to canonical names.
   *
   * "Minnesota at Los Angeles C Winner?" becomes
   * "Minnesota Vikings at Los Angeles Chargers Winner?". Text after the
   * first colon is left alone. Titles without a matchup only get their
   * standalone team codes expanded.
   */
  expandTeamNames(text: string): string {
    const colon = text.indexOf(':');
    const head = colon >= 0 ? text.slice(0, colon) : text;
    const tail = colon >= 0 ? text.slice(colon) : '';

    const match = MATCHUP_PATTERN.exec(head.trim());
    if (match) {
      const [, away, separator, home, suffix = ''] = match;
      const awayName = this.resolve(away) ?? away;
      const homeName = this.resolve(home) ?? home;
      return `${awayName} ${separator} ${homeName}${suffix}${tail}`;
    }

    const expanded = head.replace(/\b[A-Z]{2,3}\b/g, (code) => this.byCode.get(code) ?? code);
    return `${expanded}${tail}`;
  }
}
