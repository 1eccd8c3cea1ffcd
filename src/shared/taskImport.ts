import { DateTime } from 'luxon';
import { ValidationError } from './errors';
import type { ImportFormat } from './types';

/** One candidate task and the line it came from, not yet validated. */
export interface ImportRow {
  line: number;
  fields: Record<string, unknown>;
}

type ImportField = 'title' | 'description' | 'project' | 'estimatedDuration' | 'dueDate';

const CSV_COLUMNS = new Map<string, ImportField>([
  ['title', 'title'],
  ['description', 'description'],
  ['project', 'project'],
  ['duration', 'estimatedDuration'],
  ['estimated_duration', 'estimatedDuration'],
  ['estimatedduration', 'estimatedDuration'],
  ['due_date', 'dueDate'],
  ['duedate', 'dueDate']
]);

// Field order of a `Title | Description | Project | Duration | Due Date` line.
const TXT_COLUMNS: readonly ImportField[] = ['title', 'description', 'project', 'estimatedDuration', 'dueDate'];

// `Task; 25 mins` and `Task [1:30]`, as typed into the quick-add box.
const DURATION_SUFFIX = /^(.+?);\s*(\d+)\s*(?:mins?)?$/i;
const CLOCK_SUFFIX = /^(.+?)\s*\[(\d{1,2}):(\d{2})\]\s*$/;

const WHOLE_NUMBER = /^\d+$/;

const toISODateOrRaw = (value: string): string => {
  const us = DateTime.fromFormat(value, 'M/d/yyyy');
  return us.isValid ? us.toFormat('yyyy-LL-dd') : value;
};

/**
 * Cells arrive as text; numbers and US dates are converted so that the task
 * validator sees the same shapes the API takes. Anything else passes through
 * unchanged and is rejected there.
 */
const setField = (fields: Record<string, unknown>, field: ImportField, raw: string | undefined) => {
  const value = raw?.trim() ?? '';
  if (field === 'title') {
    fields.title = value;
    return;
  }
  if (value === '') {
    return;
  }
  if (field === 'estimatedDuration') {
    fields.estimatedDuration = WHOLE_NUMBER.test(value) ? Number(value) : value;
  } else if (field === 'dueDate') {
    fields.dueDate = toISODateOrRaw(value);
  } else {
    fields[field] = value;
  }
};

interface CsvRecord {
  line: number;
  cells: string[];
}

const parseCsv = (content: string): CsvRecord[] => {
  const records: CsvRecord[] = [];
  let cells: string[] = [];
  let cell = '';
  let quoted = false;
  let line = 1;
  let start = 1;

  const endRecord = () => {
    cells.push(cell);
    if (cells.some((value) => value.trim() !== '')) {
      records.push({ line: start, cells });
    }
    cells = [];
    cell = '';
  };

  for (let index = 0; index < content.length; index += 1) {
    const char = content[index];
    if (quoted) {
      if (char === '"' && content[index + 1] === '"') {
        cell += '"';
        index += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        if (char === '\n') {
          line += 1;
        }
        cell += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      cells.push(cell);
      cell = '';
    } else if (char === '\n') {
      endRecord();
      line += 1;
      start = line;
    } else if (char !== '\r') {
      cell += char;
    }
  }
  if (quoted) {
    throw new ValidationError('content', `Unterminated quoted field in the row starting on line ${start}`);
  }
  if (cell !== '' || cells.length > 0) {
    endRecord();
  }
  return records;
};

const readCsvRows = (content: string): ImportRow[] => {
  const [header, ...records] = parseCsv(content);
  if (!header) {
    return [];
  }
  const columns = header.cells.map((name) => CSV_COLUMNS.get(name.trim().toLowerCase()));
  if (!columns.includes('title')) {
    throw new ValidationError('content', 'The CSV header needs a "title" column');
  }
  return records.map((record) => {
    const fields: Record<string, unknown> = {};
    columns.forEach((field, index) => {
      if (field) {
        setField(fields, field, record.cells[index]);
      }
    });
    return { line: record.line, fields };
  });
};

const readTxtLine = (text: string): Record<string, unknown> => {
  const fields: Record<string, unknown> = {};
  if (text.includes('|')) {
    const parts = text.split('|');
    TXT_COLUMNS.forEach((field, index) => setField(fields, field, parts[index]));
    return fields;
  }
  const minutes = DURATION_SUFFIX.exec(text);
  if (minutes) {
    setField(fields, 'title', minutes[1]);
    setField(fields, 'estimatedDuration', minutes[2]);
    return fields;
  }
  const clock = CLOCK_SUFFIX.exec(text);
  if (clock) {
    setField(fields, 'title', clock[1]);
    fields.estimatedDuration = Number(clock[2]) * 60 + Number(clock[3]);
    return fields;
  }
  setField(fields, 'title', text);
  return fields;
};

const readTxtRows = (content: string): ImportRow[] =>
  content.split(/\r?\n/).flatMap((raw, index) => {
    const text = raw.trim();
    if (text === '' || text.startsWith('#')) {
      return [];
    }
    return [{ line: index + 1, fields: readTxtLine(text) }];
  });

/**
 * Splits imported text into candidate tasks. CSV takes a header row naming
 * its columns; plain text takes one task per line, either pipe-separated or
 * a title with an optional `; N mins` or `[H:MM]` duration.
 */
export const readImportRows = (content: string, format: ImportFormat): ImportRow[] => {
  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  return format === 'csv' ? readCsvRows(text) : readTxtRows(text);
};
