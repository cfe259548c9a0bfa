/**
 * Formats a time in seconds as HH:MM:SS.
 * Fractions are floored and the hour field grows past two digits when needed.
 * @param seconds - Time in seconds
 * @returns Formatted timestamp
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return [hours, mins, secs].map((n) => n.toString().padStart(2, '0')).join(':');
}
