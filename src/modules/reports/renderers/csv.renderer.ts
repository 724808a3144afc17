import * as XLSX from 'xlsx';
import { RenderedReport, ReportRow } from '../report.types';
import { sumRows } from '../report-summary';
import { PAYMENT_HEADERS, paymentCells, plainSar, reportFileStem, totalCells } from './table';

export function renderCsv(rows: ReportRow[], now: Date = new Date()): RenderedReport {
    const sheet = XLSX.utils.aoa_to_sheet([
        PAYMENT_HEADERS,
        ...rows.map(row => paymentCells(row, plainSar)),
        totalCells(sumRows(rows), plainSar),
    ]);
    const csv = XLSX.utils.sheet_to_csv(sheet);

    return {
        // BOM so Excel opens Arabic names correctly
        content: Buffer.from(`\uFEFF${csv}\n`, 'utf8'),
        contentType: 'text/csv; charset=utf-8',
        fileName: `${reportFileStem(now)}.csv`,
    };
}
