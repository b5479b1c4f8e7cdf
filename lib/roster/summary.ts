import type { PlayerRecord, RosterSummary } from "@/lib/domain/types";

// Totals shown under the filtered list. Missing goals/minutes count as zero.
export function summarize(records: readonly PlayerRecord[]): RosterSummary {
  let goals = 0;
  let minutes = 0;
  const byYear = new Map<number, number>();
  const byCompetition = new Map<string, number>();

  for (const r of records) {
    goals += r.goals ?? 0;
    minutes += r.minutes ?? 0;
    if (r.year !== null) byYear.set(r.year, (byYear.get(r.year) ?? 0) + 1);
    if (r.competition !== null) byCompetition.set(r.competition, (byCompetition.get(r.competition) ?? 0) + 1);
  }

  return {
    callUps: records.length,
    goals,
    minutes,
    byYear: [...byYear.entries()].sort((a, b) => a[0] - b[0]).map(([year, count]) => ({ year, count })),
    byCompetition: [...byCompetition.entries()]
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .map(([competition, count]) => ({ competition, count })),
  };
}
