export type ProviderPriorityCandidate = {
  id: string;
  priority: number;
  coolingDown: boolean;
  failures: number;
};

/**
 * Order providers for display and selection: usable providers first, then by
 * configured priority, fewest recent failures, and name.
 */
export function prioritizeProviderCandidates(candidates: ProviderPriorityCandidate[]): string[] {
  const rows = candidates.slice();
  rows.sort((a, b) => {
    if (a.coolingDown !== b.coolingDown) return a.coolingDown ? 1 : -1;
    if (a.priority !== b.priority) return a.priority - b.priority;
    if (a.failures !== b.failures) return a.failures - b.failures;
    return a.id.localeCompare(b.id);
  });
  return rows.map((r) => r.id);
}
