/**
 * Team name resolution.
 *
 * Venues name the same team differently: the exchange uses city names
 * ("Oklahoma City", "Los Angeles L"), sportsbooks use full names
 * ("Oklahoma City Thunder"), feeds use short codes ("OKC"). Every form
 * resolves to one canonical name per sport through data/teams.json.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { normalizeName } from "./similarity";

interface TeamEntry {
  name: string;
  aliases: string[];
}

/** Sport key → teams */
export type TeamTable = Record<string, TeamEntry[]>;

let cachedTeams: TeamTable | null = null;

function isTeamEntry(value: unknown): value is TeamEntry {
  if (typeof value !== "object" || value === null) return false;
  if (!("name" in value) || !("aliases" in value)) return false;
  const { name, aliases } = value;
  return (
    typeof name === "string" &&
    Array.isArray(aliases) &&
    aliases.every((alias) => typeof alias === "string")
  );
}

function isTeamTable(value: unknown): value is TeamTable {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (teams) => Array.isArray(teams) && teams.every(isTeamEntry)
  );
}

/**
 * Load the alias table shipped with the package (cached).
 */
export function loadTeams(): TeamTable {
  if (cachedTeams) return cachedTeams;

  const here = dirname(fileURLToPath(import.meta.url));
  const content = readFileSync(join(here, "../data/teams.json"), "utf-8");
  const parsed: unknown = JSON.parse(content);
  if (!isTeamTable(parsed)) {
    throw new Error("data/teams.json is malformed");
  }
  cachedTeams = parsed;
  return cachedTeams;
}

/**
 * Resolve a venue's team name to its canonical name for a sport.
 *
 * Exact matches on the canonical name or an alias win. Otherwise the
 * longest alias found as a whole word inside the text is used.
 *
 * @returns Canonical team name or null if not found
 */
export function resolveTeamName(
  text: string,
  category: string,
  teams: TeamTable = loadTeams()
): string | null {
  const sportTeams = teams[category];
  if (!sportTeams) return null;

  const needle = normalizeName(text);
  if (needle.length === 0) return null;

  for (const team of sportTeams) {
    if (normalizeName(team.name) === needle) return team.name;
  }
  for (const team of sportTeams) {
    if (team.aliases.some((alias) => normalizeName(alias) === needle)) {
      return team.name;
    }
  }

  // Prefer longer aliases (more specific matches)
  const padded = ` ${needle} `;
  let best: { name: string; length: number } | null = null;
  for (const team of sportTeams) {
    for (const alias of [team.name, ...team.aliases]) {
      const normalized = normalizeName(alias);
      if (normalized.length < 3) continue;
      if (padded.includes(` ${normalized} `)) {
        if (!best || normalized.length > best.length) {
          best = { name: team.name, length: normalized.length };
        }
      }
    }
  }

  return best ? best.name : null;
}
