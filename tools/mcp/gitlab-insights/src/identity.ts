/**
 * Contributor identity resolution.
 *
 * GitLab reports the same person as a commit author (name + email), an MR
 * author (username) and an issue closer (username). The alias map folds these
 * raw identities into canonical contributors; anything unmapped becomes a
 * contributor of its own, keyed by email, else username, else name.
 */

// ─── Types ──────────────────────────────────────────────

export interface ContributionTotals {
  commits: number;
  additions: number;
  deletions: number;
  mergeRequests: number;
  issuesClosed: number;
}

/** One author as seen in one project's records. */
export interface RawIdentity extends Partial<ContributionTotals> {
  username?: string | null;
  email?: string | null;
  name?: string | null;
  project: string;
}

export interface CanonicalContributor extends ContributionTotals {
  name: string;
  /** True when the alias map named this contributor */
  mapped: boolean;
  /** Every raw username, email and name folded into this contributor, sorted */
  aliases: string[];
  projects: string[];
}

export type AliasMap = Readonly<Record<string, string>>;

interface Accumulator extends ContributionTotals {
  key: string;
  canonicalName: string | null;
  rawNames: Set<string>;
  aliases: Set<string>;
  projects: Set<string>;
}

function clean(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ─── Resolver ───────────────────────────────────────────

export class IdentityResolver {
  /** Lowercased alias → canonical name */
  private readonly lookup = new Map<string, string>();

  constructor(aliasMap: AliasMap) {
    // Sorted so that keys differing only in case resolve the same way every run
    const entries = Object.entries(aliasMap).sort(([a], [b]) => compareStrings(a, b));
    for (const [alias, canonical] of entries) {
      const key = alias.trim().toLowerCase();
      if (key && !this.lookup.has(key)) this.lookup.set(key, canonical);
    }
    // A canonical name also matches itself
    for (const [, canonical] of entries) {
      const key = canonical.trim().toLowerCase();
      if (key && !this.lookup.has(key)) this.lookup.set(key, canonical);
    }
  }

  /** Canonical grouping key for one raw identity. */
  keyFor(raw: RawIdentity): { key: string; canonicalName: string | null } {
    const email = clean(raw.email)?.toLowerCase() ?? null;
    const username = clean(raw.username)?.toLowerCase() ?? null;
    const name = clean(raw.name)?.toLowerCase() ?? null;
    const emailLocal = email?.includes("@") ? email.slice(0, email.indexOf("@")) : null;

    for (const candidate of [email, username, name, emailLocal]) {
      if (candidate === null) continue;
      const canonical = this.lookup.get(candidate);
      if (canonical !== undefined) return { key: `alias:${canonical}`, canonicalName: canonical };
    }

    if (email) return { key: `email:${email}`, canonicalName: null };
    if (username) return { key: `user:${username}`, canonicalName: null };
    if (name) return { key: `name:${name}`, canonicalName: null };
    return { key: "unknown", canonicalName: null };
  }

  resolve(raws: readonly RawIdentity[]): CanonicalContributor[] {
    const groups = new Map<string, Accumulator>();

    for (const raw of raws) {
      const { key, canonicalName } = this.keyFor(raw);
      let group = groups.get(key);
      if (!group) {
        group = {
          key,
          canonicalName,
          rawNames: new Set(),
          aliases: new Set(),
          projects: new Set(),
          commits: 0,
          additions: 0,
          deletions: 0,
          mergeRequests: 0,
          issuesClosed: 0,
        };
        groups.set(key, group);
      }

      const name = clean(raw.name);
      if (name) group.rawNames.add(name);
      for (const alias of [clean(raw.email), clean(raw.username), name]) {
        if (alias) group.aliases.add(alias);
      }
      group.projects.add(raw.project);
      group.commits += raw.commits ?? 0;
      group.additions += raw.additions ?? 0;
      group.deletions += raw.deletions ?? 0;
      group.mergeRequests += raw.mergeRequests ?? 0;
      group.issuesClosed += raw.issuesClosed ?? 0;
    }

    return [...groups.values()]
      .map((group) => ({ group, contributor: toContributor(group) }))
      .sort(
        (a, b) =>
          b.contributor.commits - a.contributor.commits ||
          compareStrings(a.contributor.name, b.contributor.name) ||
          compareStrings(a.group.key, b.group.key)
      )
      .map(({ contributor }) => contributor);
  }
}

function toContributor(group: Accumulator): CanonicalContributor {
  const rawNames = [...group.rawNames].sort(compareStrings);
  const fallback = group.key.slice(group.key.indexOf(":") + 1);
  return {
    name: group.canonicalName ?? rawNames[0] ?? fallback,
    mapped: group.canonicalName !== null,
    aliases: [...group.aliases].sort(compareStrings),
    projects: [...group.projects].sort(compareStrings),
    commits: group.commits,
    additions: group.additions,
    deletions: group.deletions,
    mergeRequests: group.mergeRequests,
    issuesClosed: group.issuesClosed,
  };
}

/** Resolve raw identities against an alias map in one call. */
export function resolveIdentities(raws: readonly RawIdentity[], aliasMap: AliasMap): CanonicalContributor[] {
  return new IdentityResolver(aliasMap).resolve(raws);
}
