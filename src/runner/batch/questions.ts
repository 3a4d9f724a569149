/* src/runner/batch/questions.ts
 * Read the batch question list from a workbook.
 */
import ExcelJS from 'exceljs';
import { pathExists } from 'fs-extra';

export const DEFAULT_INPUT_FILE = 'questions.xlsx';
export const DEFAULT_SHEET_NAME = 'Questions';

/** Column A. */
const QUESTION_COLUMN = 1;
/** Row 1 holds the first question (no header row). */
const START_ROW = 1;

export type QuestionsRead =
  | { ok: true; questions: string[] }
  | { ok: false; reason: 'missing-file' | 'missing-sheet'; message: string };

/**
 * Collect column A from row 1 down to (excluding) the first blank cell.
 * Whitespace-only cells count as blank.
 */
export const readQuestions = async (
  file: string,
  sheetName: string = DEFAULT_SHEET_NAME,
): Promise<QuestionsRead> => {
  if (!(await pathExists(file))) {
    return {
      ok: false,
      reason: 'missing-file',
      message: `Error: ${file} not found.`,
    };
  }
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(file);
  const sheet = workbook.getWorksheet(sheetName);
  if (!sheet) {
    return {
      ok: false,
      reason: 'missing-sheet',
      message: `Error: worksheet "${sheetName}" not found in ${file}.`,
    };
  }

  const questions: string[] = [];
  for (let row = START_ROW; ; row++) {
    const value = sheet.getCell(row, QUESTION_COLUMN).text;
    if (value.trim().length === 0) break;
    questions.push(value);
  }
  return { ok: true, questions };
};
