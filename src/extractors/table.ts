import type { CheerioAPI } from 'cheerio';
import type { ExtractionStrategy } from '../interfaces/strategy.js';
import { ExtractionStrategyName, type EndpointRecord } from '../models/types.js';
import {
  CELL_ENDPOINT_PATTERN,
  collapseWhitespace,
  createEndpointRecord,
  normalizePath,
  parseMethod,
} from './patterns.js';

// `/` followed by segments; `{id}` and `:id` placeholders allowed
const PATH_CELL_PATTERN = /^(?:https?:\/\/\S+)?\/\S*$/i;

function parsePathCell(cell: string): string | undefined {
  return PATH_CELL_PATTERN.test(cell) ? normalizePath(cell) : undefined;
}

/**
 * Reads table rows that carry a method and a path.
 * Either one cell is exactly a method and another is exactly a path, or a
 * single cell holds `METHOD /path`. The other non-empty cells, joined with
 * " - ", become the description.
 */
export function extractFromTables($: CheerioAPI): EndpointRecord[] {
  const records: EndpointRecord[] = [];

  $('tr').each((_, row) => {
    const cells = $(row)
      .children('td, th')
      .map((_, cell) => collapseWhitespace($(cell).text()))
      .get();

    if (cells.length < 2) {
      return;
    }

    const describe = (...used: number[]) =>
      cells.filter((cell, index) => cell !== '' && !used.includes(index)).join(' - ');

    const methodIndex = cells.findIndex((cell) => parseMethod(cell) !== undefined);
    const method = methodIndex >= 0 ? parseMethod(cells[methodIndex]) : undefined;

    if (method) {
      const pathIndex = cells.findIndex((cell, index) => index !== methodIndex && parsePathCell(cell) !== undefined);
      const path = pathIndex >= 0 ? parsePathCell(cells[pathIndex]) : undefined;

      if (path) {
        records.push(
          createEndpointRecord(method, path, describe(methodIndex, pathIndex), ExtractionStrategyName.TABLE)
        );
        return;
      }
    }

    for (const [index, cell] of cells.entries()) {
      const match = CELL_ENDPOINT_PATTERN.exec(cell);
      const combinedMethod = match ? parseMethod(match[1]) : undefined;
      const combinedPath = match ? normalizePath(match[2]) : undefined;

      if (combinedMethod && combinedPath) {
        records.push(createEndpointRecord(combinedMethod, combinedPath, describe(index), ExtractionStrategyName.TABLE));
      }
    }
  });

  return records;
}

export const tableStrategy: ExtractionStrategy = {
  name: ExtractionStrategyName.TABLE,
  extract: extractFromTables,
};
