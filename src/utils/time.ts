/** vCard timestamp (RFC 6350 REV form), UTC with second precision: 20240131T235959Z */
export function vcardTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}
