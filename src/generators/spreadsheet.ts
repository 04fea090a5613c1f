import ExcelJS from 'exceljs';
import type { Fill, Font, Workbook, Worksheet } from 'exceljs';
import { ErrorCode, ExportError, ErrorUtils } from '../errors/error-types.js';
import { HttpMethod, UNKNOWN_METHOD, type DiscoveryResult } from '../models/types.js';
import { STRATEGY_PRIORITY } from '../extractors/factory.js';
import { prepareOutputFile } from '../utils/fs.js';

export const ENDPOINT_SHEET_NAME = 'API Endpoints';
export const SUMMARY_SHEET_NAME = 'Summary';

export const ENDPOINT_HEADERS = ['Method', 'Path', 'Full Endpoint', 'Description', 'Notes'];
export const HEADER_ROW = 6;

const COLUMN_WIDTHS = [12, 40, 50, 60, 30];

const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF366092' } };
const STRIPE_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFF2F2F2' } };
const HEADER_FONT: Partial<Font> = { color: { argb: 'FFFFFFFF' }, bold: true, size: 12 };
const LINK_FONT: Partial<Font> = { color: { argb: 'FF0000FF' }, underline: 'single' };

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * `{Company_Name}_API_Documentation_{YYYYMMDD_HHmmss}.xlsx`
 */
export function defaultOutputFile(company: string, now: Date = new Date()): string {
  const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_`
    + `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${company.trim().replace(/\s+/g, '_')}_API_Documentation_${stamp}.xlsx`;
}

/**
 * Renders a discovery result into an Excel workbook
 */
export class SpreadsheetGenerator {
  /**
   * Build the workbook in memory
   */
  build(result: DiscoveryResult): Workbook {
    const workbook = new ExcelJS.Workbook();
    workbook.creator = 'api-doc-discovery';
    workbook.created = result.generatedAt;

    this.addEndpointSheet(workbook, result);
    this.addSummarySheet(workbook, result);

    return workbook;
  }

  /**
   * Build the workbook and save it, creating directories as needed
   *
   * @returns the absolute path written
   * @throws ExportError when the path is invalid or the file cannot be written
   */
  async write(result: DiscoveryResult, filePath: string): Promise<string> {
    let resolvedPath: string;
    try {
      resolvedPath = await prepareOutputFile(filePath, ['.xlsx']);
    } catch (error) {
      throw new ExportError(ErrorUtils.toError(error).message, filePath, ErrorCode.OUTPUT_INVALID_PATH, ErrorUtils.toError(error));
    }

    try {
      await this.build(result).xlsx.writeFile(resolvedPath);
    } catch (error) {
      throw new ExportError(
        `Failed to write spreadsheet to ${resolvedPath}: ${ErrorUtils.toError(error).message}`,
        resolvedPath,
        ErrorCode.OUTPUT_WRITE_FAILED,
        ErrorUtils.toError(error)
      );
    }

    return resolvedPath;
  }

  private addEndpointSheet(workbook: Workbook, result: DiscoveryResult): void {
    const sheet = workbook.addWorksheet(ENDPOINT_SHEET_NAME, {
      views: [{ state: 'frozen', ySplit: HEADER_ROW }],
    });

    COLUMN_WIDTHS.forEach((width, index) => {
      sheet.getColumn(index + 1).width = width;
    });

    // Title
    sheet.mergeCells('A1:E1');
    const title = sheet.getCell('A1');
    title.value = `${result.company} API Documentation`;
    title.font = { bold: true, size: 16 };
    title.alignment = { horizontal: 'center', vertical: 'middle' };

    // Metadata
    sheet.getCell('A2').value = 'Documentation URL:';
    if (result.documentationUrl) {
      sheet.getCell('B2').value = { text: result.documentationUrl, hyperlink: result.documentationUrl };
      sheet.getCell('B2').font = LINK_FONT;
    } else {
      sheet.getCell('B2').value = 'Not found';
    }
    sheet.getCell('A3').value = 'Total Endpoints:';
    sheet.getCell('B3').value = result.endpoints.length;
    sheet.getCell('A4').value = 'Generated:';
    sheet.getCell('B4').value = formatTimestamp(result.generatedAt);

    // Header
    ENDPOINT_HEADERS.forEach((header, index) => {
      const cell = sheet.getCell(HEADER_ROW, index + 1);
      cell.value = header;
      cell.fill = HEADER_FILL;
      cell.font = HEADER_FONT;
      cell.alignment = { horizontal: 'center', vertical: 'middle' };
    });

    const rows: string[][] = result.endpoints.length > 0
      ? result.endpoints.map((endpoint) => [endpoint.method, endpoint.path, endpoint.fullEndpoint, endpoint.description, ''])
      : [[
        'N/A',
        'N/A',
        'See documentation URL above',
        `Automatic extraction failed. Please visit ${result.documentationUrl ?? 'the documentation site'} to view endpoints.`,
        '',
      ]];

    rows.forEach((values, offset) => {
      const rowNumber = HEADER_ROW + 1 + offset;
      this.writeRow(sheet, rowNumber, values);
      if (rowNumber % 2 === 0) {
        values.forEach((_, index) => {
          sheet.getCell(rowNumber, index + 1).fill = STRIPE_FILL;
        });
      }
    });

    sheet.autoFilter = {
      from: { row: HEADER_ROW, column: 1 },
      to: { row: HEADER_ROW + rows.length, column: ENDPOINT_HEADERS.length },
    };
  }

  private addSummarySheet(workbook: Workbook, result: DiscoveryResult): void {
    const sheet = workbook.addWorksheet(SUMMARY_SHEET_NAME);
    sheet.getColumn(1).width = 28;
    sheet.getColumn(2).width = 60;

    sheet.getCell('A1').value = 'API Discovery Summary';
    sheet.getCell('A1').font = { bold: true, size: 14 };

    this.writeRow(sheet, 2, ['Company', result.company]);
    this.writeRow(sheet, 3, ['Documentation URL', result.documentationUrl ?? 'Not found']);
    this.writeRow(sheet, 4, ['Total Endpoints', result.endpoints.length]);

    let rowNumber = 6;
    sheet.getCell(rowNumber, 1).value = 'Endpoints by Method';
    sheet.getCell(rowNumber, 1).font = { bold: true };
    for (const method of [...Object.values(HttpMethod), UNKNOWN_METHOD]) {
      const count = result.endpoints.filter((endpoint) => endpoint.method === method).length;
      if (count > 0) {
        rowNumber += 1;
        this.writeRow(sheet, rowNumber, [method, count]);
      }
    }

    rowNumber += 2;
    sheet.getCell(rowNumber, 1).value = 'Endpoints by Strategy';
    sheet.getCell(rowNumber, 1).font = { bold: true };
    for (const strategy of STRATEGY_PRIORITY) {
      const count = result.endpoints.filter((endpoint) => endpoint.sourceStrategy === strategy).length;
      if (count > 0) {
        rowNumber += 1;
        this.writeRow(sheet, rowNumber, [strategy, count]);
      }
    }
  }

  private writeRow(sheet: Worksheet, rowNumber: number, values: Array<string | number>): void {
    values.forEach((value, index) => {
      sheet.getCell(rowNumber, index + 1).value = value;
    });
  }
}
