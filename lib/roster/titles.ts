import type { TitleGroup, TitleRecord } from "@/lib/domain/types";
import { ALL, type All } from "@/lib/roster/config";

const byText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export function filterTitles<T extends TitleRecord>(titles: T[], category: string | All = ALL): T[] {
  if (category === ALL) return titles;
  return titles.filter((t) => t.category === category);
}

// Categories in order, each with its titles sorted. Rows without a title or category are left out.
export function groupTitlesByCategory(titles: readonly TitleRecord[]): TitleGroup[] {
  const groups = new Map<string, string[]>();
  for (const t of titles) {
    if (t.category === null || t.title === null) continue;
    const list = groups.get(t.category) ?? [];
    list.push(t.title);
    groups.set(t.category, list);
  }
  return [...groups.keys()].sort(byText).map((category) => ({
    category,
    titles: (groups.get(category) ?? []).sort(byText),
  }));
}

export function titleCategories(titles: readonly TitleRecord[]): string[] {
  const seen = new Set<string>();
  for (const t of titles) if (t.category !== null) seen.add(t.category);
  return [...seen].sort(byText);
}
