// src/infrastructure/webserver/middleware/upload.middleware.ts
import multer from 'multer';
import path from 'path';
import config from '../../../config';

// Workbooks are parsed straight from memory and never stored
const storage = multer.memoryStorage();

const ALLOWED_MIMES = new Set([
    'application/vnd.ms-excel', // .xls
    'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet', // .xlsx
    'application/vnd.ms-excel.sheet.macroEnabled.12', // .xlsm
    'application/vnd.oasis.opendocument.spreadsheet', // .ods
    'text/csv',
]);
// Browsers often send spreadsheets as octet-stream; the extension decides then
const ALLOWED_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls', '.ods', '.csv']);

export const TIMESHEET_FILES_FIELD = 'files';

function isAcceptedSpreadsheet(file: Pick<Express.Multer.File, 'mimetype' | 'originalname'>): boolean {
    return ALLOWED_MIMES.has(file.mimetype) || ALLOWED_EXTENSIONS.has(path.extname(file.originalname).toLowerCase());
}

/**
 * Why a file cannot be imported, or null for a spreadsheet. Files are not
 * filtered out by multer: one bad file fails alone in the import report.
 */
export function spreadsheetRejection(file: Pick<Express.Multer.File, 'mimetype' | 'originalname'>): string | null {
    if (isAcceptedSpreadsheet(file)) return null;
    return `Invalid file type: ${file.mimetype}. Only spreadsheets (.xlsx, .xls, .ods, .csv) are allowed.`;
}

const upload = multer({
    storage,
    limits: {
        fileSize: config.timesheets.uploadMaxFileMb * 1024 * 1024,
    },
});

/**
 * Accepts any number of timesheet workbooks under the `files` field,
 * next to the `year` and `month` form fields.
 */
export const uploadTimesheetFiles = upload.array(TIMESHEET_FILES_FIELD);
