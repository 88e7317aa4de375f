/**
 * Producers send tags either as a comma-delimited string or as a list.
 * Both collapse to one trimmed list that keeps the producer's order.
 */
export function normalizeTags(value: unknown): string[] {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  }
  if (Array.isArray(value)) {
    return value
      .filter((tag): tag is string => typeof tag === "string")
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  }
  return [];
}
