/**
 * Value Formatters
 *
 * Turn field names into header labels and raw row values into cell text.
 * Used when a column has no renderer of its own.
 *
 * @module formatters
 */

// =============================================================================
// Labels
// =============================================================================

/**
 * Derive a header label from a field name: underscores become spaces and
 * every word starts upper-case (`created_at` → `Created At`).
 */
export function labelFromField(field: string): string {
  return field
    .replace(/_/g, ' ')
    .replace(/(^|\s)(\S)/g, (_match, space: string, first: string) => space + first.toUpperCase());
}

// =============================================================================
// Cell Values
// =============================================================================

/**
 * Format a raw field value as cell text. Absent values render as an empty
 * cell.
 */
export function formatCellValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Read a field from a row. Rows are plain records, or class instances whose
 * getters expose the fields.
 */
export function readField(row: object, field: string): unknown {
  return Reflect.get(row, field);
}
