/**
 * Format a float the way the collaborators print them (1000 -> "1000.0")
 */
export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
