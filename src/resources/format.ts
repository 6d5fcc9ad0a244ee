import type { RolloutCondition } from "./types";

type Timestamp = Date | string | undefined;

function toDate(value: Timestamp): Date | undefined {
  if (value === undefined) return undefined;
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

// Age in kubectl's short form: 5m, 3h12m, 2d4h.
export function getAge(creationTimestamp: Timestamp, now: Date): string {
  const createdAt = toDate(creationTimestamp);
  if (!createdAt) return "N/A";

  const diffInMs = Math.max(0, now.getTime() - createdAt.getTime());
  const diffInMinutes = Math.floor(diffInMs / (1000 * 60));
  const diffInHours = Math.floor(diffInMinutes / 60);
  const diffInDays = Math.floor(diffInHours / 24);
  const remainingHours = diffInHours % 24;

  if (diffInHours < 1) {
    return `${diffInMinutes}m`;
  } else if (diffInHours < 24) {
    return `${diffInHours}h${diffInMinutes % 60}m`;
  } else {
    return `${diffInDays}d${remainingHours}h`;
  }
}

export function labelSelectorString(matchLabels: Record<string, string> | undefined): string | undefined {
  if (!matchLabels) return undefined;
  const pairs = Object.entries(matchLabels).map(([key, value]) => `${key}=${value}`);
  return pairs.length > 0 ? pairs.join(",") : undefined;
}

export function rolloutConditions(conditions: readonly RolloutCondition[] | undefined): RolloutCondition[] {
  return (conditions ?? []).map(({ type, status, reason, message }) => ({ type, status, reason, message }));
}
