/**
 * Cell Data Parser
 *
 * Parses the compact text form of grid data used by diagram styles:
 *
 *   a 10 b 5+1 c =20 d
 *
 * Whitespace separates grid-line ids from data tokens. A data token holds
 * one or more items with no space between them:
 * - `<number>`  minimum size of the gap to the next id
 * - `+<number>` growth of the gap to the next id
 * - `=<number>` position of the previous id
 *
 * TEST: tests/unit/layout/cell-data-parser.test.ts
 */

import { GridData } from '../grid/types.js';
import { CellDataParseError } from '../grid/errors.js';
import { GridIntern } from './types.js';

const DATA_START = /^[-+=.\d]/;
const DATA_ITEM = /([+=]?)(-?(?:\d+\.?\d*|\.\d+))/y;
const ID_FORBIDDEN = /[+.=]/;

interface DataItem {
  kind: '' | '+' | '=';
  value: number;
}

/**
 * Split a data token into its items
 *
 * @throws CellDataParseError if any part of the token is not an item
 */
function parseDataToken(token: string): DataItem[] {
  const items: DataItem[] = [];
  DATA_ITEM.lastIndex = 0;
  while (DATA_ITEM.lastIndex < token.length) {
    const offset = DATA_ITEM.lastIndex;
    const match = DATA_ITEM.exec(token);
    if (!match) {
      throw new CellDataParseError(token, `unexpected text at offset ${offset}`);
    }
    const prefix = match[1];
    const kind = prefix === '+' || prefix === '=' ? prefix : '';
    items.push({ kind, value: parseFloat(match[2]) });
  }
  return items;
}

/**
 * Parse cell data text into grid data for one axis
 */
export function parseCellData(text: string, intern: GridIntern): GridData<number>[] {
  const result: GridData<number>[] = [];
  let last: number | null = null;
  let size: number | null = null;
  let growth: number | null = null;

  for (const token of text.split(/\s+/).filter((t) => t.length > 0)) {
    if (DATA_START.test(token)) {
      for (const item of parseDataToken(token)) {
        if (last === null) {
          throw new CellDataParseError(token, 'data before the first grid line');
        }
        if (item.kind === '=') {
          result.push({ kind: 'place', node: last, position: item.value });
        } else if (item.kind === '+') {
          growth = item.value;
        } else {
          size = item.value;
        }
      }
      continue;
    }

    if (ID_FORBIDDEN.test(token)) {
      throw new CellDataParseError(token, "grid line names must not contain '+', '.' or '='");
    }
    const id = intern(token);
    if (last !== null) {
      if (size !== null) result.push({ kind: 'width', start: last, end: id, size });
      if (growth !== null) result.push({ kind: 'growth', start: last, end: id, growth });
    }
    last = id;
    size = null;
    growth = null;
  }

  if (size !== null || growth !== null) {
    throw new CellDataParseError(text, 'size or growth after the last grid line');
  }
  return result;
}
