/**
 * Cap text at `maxChars` code points, marking the cut with "..."
 */
export function truncate(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) return text;
  return `${chars.slice(0, Math.max(0, maxChars - 3)).join("")}...`;
}
