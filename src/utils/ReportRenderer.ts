/**
 * Markdown table reports returned by every tool.
 */

export interface ReportColumn {
  header: string;
  /** Cells longer than this are cut and marked with `...` */
  maxWidth?: number;
}

export interface ReportOptions {
  title: string;
  columns: Array<ReportColumn | string>;
  rows: string[][];
  /** Returned in place of the table when there are no rows */
  emptyMessage?: string;
  /** Lines printed between the title and the table */
  preamble?: string[];
  /** Line printed after the table */
  summary?: string;
}

export const DEFAULT_EMPTY_MESSAGE = 'No resources found.';
const ELLIPSIS = '...';

export function truncate(text: string, maxWidth?: number): string {
  if (maxWidth === undefined || text.length <= maxWidth) return text;
  return `${text.slice(0, maxWidth)}${ELLIPSIS}`;
}

export function escapeCell(text: string): string {
  return text.replace(/\r?\n|\r/g, ' ').replace(/\|/g, '\\|');
}

function normalizeColumn(column: ReportColumn | string): ReportColumn {
  return typeof column === 'string' ? { header: column } : column;
}

export function renderTable(columns: Array<ReportColumn | string>, rows: string[][]): string {
  const normalized = columns.map(normalizeColumn);
  const header = `| ${normalized.map((column) => column.header).join(' | ')} |`;
  const separator = `|${normalized
    .map((column) => '-'.repeat(Math.max(3, column.header.length + 2)))
    .join('|')}|`;
  const body = rows.map((row) => {
    const cells = normalized.map((column, index) =>
      escapeCell(truncate(row[index] ?? '', column.maxWidth)),
    );
    return `| ${cells.join(' | ')} |`;
  });
  return [header, separator, ...body].join('\n');
}

/**
 * Render a titled table. With no rows only the empty message is returned,
 * so a header is never printed without a body.
 */
export function renderReport(options: ReportOptions): string {
  if (options.rows.length === 0) {
    return options.emptyMessage ?? DEFAULT_EMPTY_MESSAGE;
  }

  const lines = [`## ${options.title}`, ''];
  if (options.preamble && options.preamble.length > 0) {
    lines.push(...options.preamble, '');
  }
  lines.push(renderTable(options.columns, options.rows));
  if (options.summary) {
    lines.push('', options.summary);
  }
  return lines.join('\n');
}
