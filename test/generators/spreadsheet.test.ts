import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ENDPOINT_HEADERS,
  SpreadsheetGenerator,
  defaultOutputFile,
  formatTimestamp,
} from '../../src/generators/spreadsheet.js';
import { ErrorCode, ExportError } from '../../src/errors/error-types.js';
import { createEndpointRecord } from '../../src/extractors/patterns.js';
import { ExtractionStrategyName, HttpMethod, type DiscoveryResult } from '../../src/models/types.js';

const GENERATED_AT = new Date(2024, 2, 5, 9, 7, 3);

const RESULT: DiscoveryResult = {
  company: 'Acme',
  documentationUrl: 'https://docs.acme.com',
  generatedAt: GENERATED_AT,
  endpoints: [
    createEndpointRecord(HttpMethod.GET, '/v1/users', 'List users', ExtractionStrategyName.CODE_BLOCK),
    createEndpointRecord(HttpMethod.POST, '/v1/orders', 'Create an order', ExtractionStrategyName.TABLE),
    createEndpointRecord(HttpMethod.GET, '/v1/orders', '', ExtractionStrategyName.LOOSE_TEXT),
  ],
};

function rowValues(sheet: Worksheet, row: number, columns: number): unknown[] {
  return Array.from({ length: columns }, (_, index) => sheet.getCell(row, index + 1).value);
}

function sheetNamed(workbook: Workbook, name: string): Worksheet {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) {
    throw new Error(`missing sheet ${name}`);
  }
  return sheet;
}

describe('formatting helpers', () => {
  it('formats the generation timestamp', () => {
    expect(formatTimestamp(GENERATED_AT)).toBe('2024-03-05 09:07:03');
  });

  it('derives the default file name from the company and time', () => {
    expect(defaultOutputFile('Acme Corp', GENERATED_AT)).toBe('Acme_Corp_API_Documentation_20240305_090703.xlsx');
  });
});

describe('SpreadsheetGenerator.build', () => {
  it('lays out the endpoint sheet', () => {
    const sheet = sheetNamed(new SpreadsheetGenerator().build(RESULT), 'API Endpoints');

    expect(sheet.getCell('A1').value).toBe('Acme API Documentation');
    expect(sheet.getCell('E1').isMerged).toBe(true);
    expect(sheet.getCell('E1').master.address).toBe('A1');
    expect(sheet.getCell('B2').value).toEqual({ text: 'https://docs.acme.com', hyperlink: 'https://docs.acme.com' });
    expect(rowValues(sheet, 3, 2)).toEqual(['Total Endpoints:', 3]);
    expect(rowValues(sheet, 4, 2)).toEqual(['Generated:', '2024-03-05 09:07:03']);
    expect(rowValues(sheet, 6, 5)).toEqual(ENDPOINT_HEADERS);
    expect(rowValues(sheet, 7, 5)).toEqual(['GET', '/v1/users', 'GET /v1/users', 'List users', '']);
    expect(rowValues(sheet, 8, 5)).toEqual(['POST', '/v1/orders', 'POST /v1/orders', 'Create an order', '']);
    expect(rowValues(sheet, 9, 5)).toEqual(['GET', '/v1/orders', 'GET /v1/orders', '', '']);
  });

  it('styles the header and stripes alternate rows', () => {
    const sheet = sheetNamed(new SpreadsheetGenerator().build(RESULT), 'API Endpoints');

    expect(sheet.getCell('A6').fill).toMatchObject({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF366092' } });
    expect(sheet.getCell('A6').font).toMatchObject({ bold: true, color: { argb: 'FFFFFFFF' } });
    expect(sheet.getCell('C8').fill).toMatchObject({ fgColor: { argb: 'FFF2F2F2' } });
    expect([1, 2, 3, 4, 5].map((column) => sheet.getColumn(column).width)).toEqual([12, 40, 50, 60, 30]);
    expect(sheet.views[0]).toMatchObject({ state: 'frozen', ySplit: 6 });
    expect(sheet.autoFilter).toEqual({ from: { row: 6, column: 1 }, to: { row: 9, column: 5 } });
  });

  it('writes a placeholder row when no endpoints were extracted', () => {
    const sheet = sheetNamed(
      new SpreadsheetGenerator().build({ ...RESULT, endpoints: [] }),
      'API Endpoints'
    );

    expect(sheet.getCell('B3').value).toBe(0);
    expect(rowValues(sheet, 7, 4)).toEqual([
      'N/A',
      'N/A',
      'See documentation URL above',
      'Automatic extraction failed. Please visit https://docs.acme.com to view endpoints.',
    ]);
  });

  it('counts endpoints per method and per strategy on the summary sheet', () => {
    const sheet = sheetNamed(new SpreadsheetGenerator().build(RESULT), 'Summary');

    expect(rowValues(sheet, 2, 2)).toEqual(['Company', 'Acme']);
    expect(rowValues(sheet, 4, 2)).toEqual(['Total Endpoints', 3]);
    expect(sheet.getCell('A6').value).toBe('Endpoints by Method');
    expect(rowValues(sheet, 7, 2)).toEqual(['GET', 2]);
    expect(rowValues(sheet, 8, 2)).toEqual(['POST', 1]);
    expect(sheet.getCell('A10').value).toBe('Endpoints by Strategy');
    expect(rowValues(sheet, 11, 2)).toEqual(['code-block', 1]);
    expect(rowValues(sheet, 12, 2)).toEqual(['table', 1]);
    expect(rowValues(sheet, 13, 2)).toEqual(['loose-text', 1]);
  });
});

describe('SpreadsheetGenerator.write', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'api-discovery-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates missing directories and writes a readable workbook', async () => {
    const written = await new SpreadsheetGenerator().write(RESULT, join(dir, 'nested', 'acme.xlsx'));

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(written);

    expect(written).toBe(join(dir, 'nested', 'acme.xlsx'));
    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['API Endpoints', 'Summary']);
    expect(sheetNamed(workbook, 'API Endpoints').getCell('C7').value).toBe('GET /v1/users');
  });

  it('rejects paths that are not .xlsx', async () => {
    const error = await new SpreadsheetGenerator().write(RESULT, join(dir, 'acme.csv')).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExportError);
    expect(error).toMatchObject({
      message: 'Invalid file extension: .csv. Expected .xlsx',
      code: ErrorCode.OUTPUT_INVALID_PATH,
    });
  });
});
