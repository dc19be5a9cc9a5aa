/**
 * Market matcher.
 *
 * Pairs each exchange instrument with the odds-venue lines that describe
 * the same real-world market. Candidates are filtered by sport and market
 * type, scored on participant names and start-time proximity, and kept
 * when the score clears the threshold. At most one line per odds venue
 * survives per instrument. Nothing is cached between cycles.
 */

import type { Side } from "../normalization/types";
import type {
  ExchangeMarketType,
  Instrument,
  MatchedLine,
  MatchedPair,
  MatchWeights,
  MatcherOptions,
  OddsLine,
  OddsMarketType,
  OddsOutcome,
} from "./types";
import { DEFAULT_MATCHER_OPTIONS } from "./types";
import { normalizeName, textSimilarity } from "./similarity";
import { type TeamTable, loadTeams, resolveTeamName } from "./teamNames";

const COMPATIBLE_TYPES: Record<ExchangeMarketType, OddsMarketType> = {
  winner: "moneyline",
  spread: "spread",
  total: "total",
};

/** Minimum similarity for an outcome name to stand for the subject */
const SUBJECT_MATCH_MIN = 0.8;

const POINT_EPSILON = 1e-9;

const SCORE_EPSILON = 1e-9;

export function isCompatibleMarketType(
  exchangeType: ExchangeMarketType,
  oddsType: OddsMarketType
): boolean {
  return COMPATIBLE_TYPES[exchangeType] === oddsType;
}

/**
 * Weighted match score, normalized to 0-1. Non-decreasing in both the
 * name similarity and the time proximity.
 */
export function scoreMatch(
  nameSimilarity: number,
  timeProximity: number,
  weights: MatchWeights
): number {
  const total = weights.name + weights.time + weights.type;
  if (total <= 0) return 0;
  return (
    (weights.name * nameSimilarity + weights.time * timeProximity + weights.type) / total
  );
}

/**
 * 1 at identical start times, falling linearly to 0 at the tolerance edge.
 * Returns null outside the window.
 */
export function timeProximity(
  startA: number,
  startB: number,
  toleranceMs: number
): number | null {
  const delta = Math.abs(startA - startB);
  if (delta > toleranceMs) return null;
  if (toleranceMs <= 0) return 1;
  return 1 - delta / toleranceMs;
}

/**
 * Similarity of two team names. Names that both resolve through the alias
 * table are either the same team (1) or not (0).
 */
export function teamSimilarity(
  a: string,
  b: string,
  category: string,
  teams: TeamTable = loadTeams()
): number {
  const resolvedA = resolveTeamName(a, category, teams);
  const resolvedB = resolveTeamName(b, category, teams);
  if (resolvedA && resolvedB) {
    return resolvedA === resolvedB ? 1 : 0;
  }
  return textSimilarity(resolvedA ?? a, resolvedB ?? b);
}

/**
 * Participant similarity in the better of the two orientations, since
 * venues disagree on home/away order.
 */
export function participantSimilarity(
  left: readonly [string, string],
  right: readonly [string, string],
  category: string,
  teams: TeamTable = loadTeams()
): number {
  const sim = (a: string, b: string) => teamSimilarity(a, b, category, teams);
  const straight = (sim(left[0], right[0]) + sim(left[1], right[1])) / 2;
  const crossed = (sim(left[0], right[1]) + sim(left[1], right[0])) / 2;
  return Math.max(straight, crossed);
}

function samePoint(a: number | undefined, b: number | undefined): boolean {
  if (a === undefined || b === undefined) return false;
  return Math.abs(a - b) < POINT_EPSILON;
}

/**
 * Decide which odds outcome pays when exchange side A pays.
 * Returns null when the line cannot represent the instrument.
 */
export function mapOutcomes(
  instrument: Instrument,
  line: OddsLine,
  teams: TeamTable = loadTeams()
): Record<Side, OddsOutcome> | null {
  const [first, second] = line.outcomes;

  if (instrument.marketType === "total") {
    const subject = normalizeName(instrument.subject);
    if (subject !== "over" && subject !== "under") return null;
    if (!samePoint(first.point, instrument.point) || !samePoint(second.point, instrument.point)) {
      return null;
    }
    const names = [normalizeName(first.name), normalizeName(second.name)];
    const subjectIndex = names.indexOf(subject);
    if (subjectIndex === -1) return null;
    const otherIndex = subjectIndex === 0 ? 1 : 0;
    return { A: line.outcomes[subjectIndex], B: line.outcomes[otherIndex] };
  }

  const simFirst = teamSimilarity(first.name, instrument.subject, line.category, teams);
  const simSecond = teamSimilarity(second.name, instrument.subject, line.category, teams);
  if (Math.max(simFirst, simSecond) < SUBJECT_MATCH_MIN || simFirst === simSecond) {
    return null;
  }
  const [subjectOutcome, otherOutcome] = simFirst > simSecond ? [first, second] : [second, first];

  if (instrument.marketType === "spread") {
    if (instrument.point === undefined) return null;
    if (
      !samePoint(subjectOutcome.point, instrument.point) ||
      !samePoint(otherOutcome.point, -instrument.point)
    ) {
      return null;
    }
  }

  return { A: subjectOutcome, B: otherOutcome };
}

/**
 * Score one candidate line against an instrument.
 * Returns null when the line is excluded or below threshold.
 */
export function evaluateCandidate(
  instrument: Instrument,
  line: OddsLine,
  options: MatcherOptions = DEFAULT_MATCHER_OPTIONS,
  teams: TeamTable = loadTeams()
): MatchedLine | null {
  if (line.category !== instrument.category) return null;
  if (!isCompatibleMarketType(instrument.marketType, line.marketType)) return null;

  const proximity = timeProximity(instrument.startTime, line.startTime, options.timeToleranceMs);
  if (proximity === null) return null;

  const nameSimilarity = participantSimilarity(
    instrument.participants,
    [line.awayTeam, line.homeTeam],
    instrument.category,
    teams
  );

  const confidence = scoreMatch(nameSimilarity, proximity, options.weights);
  if (confidence < options.threshold) return null;

  const outcomeFor = mapOutcomes(instrument, line, teams);
  if (!outcomeFor) return null;

  return {
    line,
    confidence,
    basis: {
      nameSimilarity,
      timeProximity: proximity,
      marketTypes: [instrument.marketType, line.marketType],
    },
    outcomeFor,
  };
}

/**
 * Ordering for candidates of the same odds venue: confidence, then time
 * proximity, then name similarity (all descending).
 */
export function compareMatchedLines(a: MatchedLine, b: MatchedLine): number {
  if (Math.abs(a.confidence - b.confidence) > SCORE_EPSILON) {
    return b.confidence - a.confidence;
  }
  if (Math.abs(a.basis.timeProximity - b.basis.timeProximity) > SCORE_EPSILON) {
    return b.basis.timeProximity - a.basis.timeProximity;
  }
  return b.basis.nameSimilarity - a.basis.nameSimilarity;
}

/**
 * Match exchange instruments to odds-venue lines for one cycle.
 *
 * @returns One pair per instrument that has at least one accepted line
 */
export function matchMarkets(
  instruments: readonly Instrument[],
  lines: readonly OddsLine[],
  options: MatcherOptions = DEFAULT_MATCHER_OPTIONS,
  teams: TeamTable = loadTeams()
): MatchedPair[] {
  const linesByCategory = new Map<string, OddsLine[]>();
  for (const line of lines) {
    const bucket = linesByCategory.get(line.category);
    if (bucket) {
      bucket.push(line);
    } else {
      linesByCategory.set(line.category, [line]);
    }
  }

  const pairs: MatchedPair[] = [];

  for (const instrument of instruments) {
    const candidates = linesByCategory.get(instrument.category) ?? [];
    const bestByVenue = new Map<string, MatchedLine>();

    for (const line of candidates) {
      const matched = evaluateCandidate(instrument, line, options, teams);
      if (!matched) continue;
      const current = bestByVenue.get(line.venue);
      if (!current || compareMatchedLines(matched, current) < 0) {
        bestByVenue.set(line.venue, matched);
      }
    }

    if (bestByVenue.size === 0) continue;

    const matchedLines = [...bestByVenue.values()].sort(compareMatchedLines);
    pairs.push({
      key: instrument.id,
      instrument,
      lines: matchedLines,
      confidence: matchedLines[0].confidence,
    });
  }

  return pairs;
}
