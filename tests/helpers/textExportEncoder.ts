import { ValidationError } from '../../src/lib/errors';
import type { ExportEncoder, ExportTable } from '../../src/lib/revenueReportAssembler';
import type { ExportFormat, ReportFormat } from '../../src/types/revenue';

function csvCell(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function rowObjects(table: ExportTable): Record<string, string>[] {
  return table.rows.map((row) => Object.fromEntries(table.columns.map((c, i) => [c, row[i] ?? ''])));
}

/** Stand-in document encoder for tests: csv and json text, nothing else. */
export class TextExportEncoder implements ExportEncoder {
  readonly calls: Array<ReportFormat | ExportFormat> = [];

  async encode(format: ReportFormat | ExportFormat, table: ExportTable): Promise<Uint8Array> {
    this.calls.push(format);
    switch (format) {
      case 'csv':
        return new TextEncoder().encode(
          [table.columns, ...table.rows].map((row) => row.map(csvCell).join(',')).join('\n') + '\n',
        );
      case 'json':
        return new TextEncoder().encode(JSON.stringify(rowObjects(table)));
      default:
        throw new ValidationError('format', `No test encoder for ${format}`, 'unsupported_format');
    }
  }
}
