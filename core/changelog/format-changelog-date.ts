/**
 * Format a date as `MM/DD/YYYY` in local time.
 *
 * @param date - Date to format.
 * @returns Formatted date.
 */
export function formatChangelogDate(date: Date): string {
  let month = String(date.getMonth() + 1).padStart(2, '0')
  let day = String(date.getDate()).padStart(2, '0')
  return `${month}/${day}/${date.getFullYear()}`
}
