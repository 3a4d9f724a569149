/* src/runner/batch/results.ts
 * Batch result rows and the output workbook they are written to.
 */
import path from 'node:path';

import ExcelJS, { type Workbook } from 'exceljs';
import { ensureDir } from 'fs-extra';

import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_BATCH_TRUNCATE } from '@/runner/util/debug-scopes';

/** Maximum characters an xlsx cell holds. */
export const CELL_CHARACTER_LIMIT = 32767;

export const RESULTS_SHEET_NAME = 'Results';

export const RESULT_HEADERS = [
  'Question',
  'Response',
  'Conversation id',
  'Timestamp',
  'Response Log',
] as const;

export const SYSTEM_START_QUESTION = 'System Start';

export type ResultRow = {
  question: string;
  response: string;
  conversationId: string;
  timestamp: Date;
  responseLog: string;
};

/** Keep the first `limit` characters; shorter values pass through. */
export const truncateCell = (
  value: string,
  limit: number = CELL_CHARACTER_LIMIT,
): string => {
  if (value.length <= limit) return value;
  debugFallback(
    DBG_SCOPE_BATCH_TRUNCATE,
    `${String(value.length)} chars cut to ${String(limit)}`,
  );
  return value.substring(0, limit);
};

/** Output file name for a run started at `startedAt` (local time). */
export const resultsFileName = (startedAt: Date): string => {
  const p2 = (n: number) => String(n).padStart(2, '0');
  const date = [
    String(startedAt.getFullYear()),
    p2(startedAt.getMonth() + 1),
    p2(startedAt.getDate()),
  ].join('-');
  const time = [
    p2(startedAt.getHours()),
    p2(startedAt.getMinutes()),
    p2(startedAt.getSeconds()),
  ].join('-');
  return `Response_${date}_${time}.xlsx`;
};

/** Accumulates rows in memory; the workbook is built and written once. */
export class ResultsWorkbook {
  private readonly rows: ResultRow[] = [];

  public add(row: ResultRow): void {
    this.rows.push({
      ...row,
      response: truncateCell(row.response),
      conversationId: truncateCell(row.conversationId),
      responseLog: truncateCell(row.responseLog),
    });
  }

  public get size(): number {
    return this.rows.length;
  }

  public toWorkbook(): Workbook {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(RESULTS_SHEET_NAME);
    sheet.addRow([...RESULT_HEADERS]);
    for (const r of this.rows) {
      sheet.addRow([
        r.question,
        r.response,
        r.conversationId,
        r.timestamp,
        r.responseLog,
      ]);
    }
    sheet.getColumn(4).numFmt = 'yyyy-mm-dd hh:mm:ss';
    return workbook;
  }

  /** Write to `file`, creating its directory when needed. */
  public async save(file: string): Promise<void> {
    await ensureDir(path.dirname(file));
    await this.toWorkbook().xlsx.writeFile(file);
  }
}
