export const ELLIPSIS = '…';

/**
 * Shorten `text` to at most `length` characters, replacing the last kept
 * character with an ellipsis. A non-positive length yields an empty string.
 */
export function truncate(text: string, length: number): string {
  if (length <= 0) {
    return '';
  }
  if (text.length > length) {
    return text.slice(0, length - 1) + ELLIPSIS;
  }
  return text;
}

export interface HumanJoinOptions {
  bold?: boolean;
  code?: boolean;
  conjunction?: string;
}

/**
 * `['a', 'b', 'c']` becomes `a, b and c`.
 */
export function humanJoin(items: readonly unknown[], options: HumanJoinOptions = {}): string {
  const { bold = false, code = false, conjunction = 'and' } = options;

  const formatted = items.map((item) => {
    let value = String(item);
    if (code) value = `\`${value}\``;
    if (bold) value = `**${value}**`;
    return value;
  });

  if (formatted.length === 0) return '';
  if (formatted.length === 1) return formatted[0] ?? '';

  return `${formatted.slice(0, -1).join(', ')} ${conjunction} ${formatted[formatted.length - 1]}`;
}

const pad = (value: number) => value.toString().padStart(2, '0');

/** `hh:mm:ss`, or `mm:ss` below one hour. */
export function formatSeconds(seconds: number): string {
  let remaining = Math.round(seconds);
  const hours = Math.floor(remaining / 3600);
  remaining %= 3600;
  const minutes = Math.floor(remaining / 60);
  remaining %= 60;

  return hours > 0
    ? `${pad(hours)}:${pad(minutes)}:${pad(remaining)}`
    : `${pad(minutes)}:${pad(remaining)}`;
}

export function formatMilliseconds(ms: number): string {
  return formatSeconds(ms / 1000);
}

/** Zero padded 1-based playlist position, e.g. `007`. */
export function formatPosition(position: number): string {
  return position.toString().padStart(3, '0');
}

/**
 * Render rows as a fixed width text table with a header separator.
 */
export function createTableRepresentation(rows: readonly Record<string, unknown>[]): string {
  const first = rows[0];
  if (!first) {
    return '';
  }

  const columns = Object.keys(first);
  const cells = rows.map((row) => columns.map((column) => formatCell(row[column])));
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => (line[index] ?? '').length))
  );

  const renderLine = (values: string[]) =>
    `| ${values.map((value, index) => value.padEnd(widths[index] ?? 0)).join(' | ')} |`;
  const separator = `+${widths.map((width) => ` ${'-'.repeat(width)} `).join('+')}+`;

  return [renderLine(columns), separator, ...cells.map(renderLine)].join('\n');
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (Buffer.isBuffer(value)) return `<${value.length} bytes>`;
  return String(value);
}
