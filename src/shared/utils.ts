/**
 * Small pure helpers shared across modules.
 */

// ---------------------------------------------------------------------------
// String utilities
// ---------------------------------------------------------------------------

/**
 * Upper-cases the first character and lower-cases the rest.
 * Example: "COMBINATION" -> "Combination", "status" -> "Status"
 */
export function capitalize(text: string): string {
  if (text.length === 0) {
    return text;
  }
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

// ---------------------------------------------------------------------------
// URL utilities
// ---------------------------------------------------------------------------

/**
 * Resolves a possibly relative URL (e.g. a form action) against the URL of
 * the page it was found on. An empty reference resolves to the base itself.
 */
export function resolveUrl(reference: string, baseUrl: string): string {
  return new URL(reference, baseUrl).toString();
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Formats a millisecond duration as "1h 2m 3s" / "2m 3s" / "3s".
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

