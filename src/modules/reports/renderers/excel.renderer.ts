import * as XLSX from 'xlsx';
import { RenderedReport, ReportRow, ReportSummary } from '../report.types';
import { sumRows } from '../report-summary';
import { PAYMENT_HEADERS, paymentCells, reportFileStem, totalCells } from './table';
import { fromHalalas } from '../../../common/utils/money.util';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function renderExcel(rows: ReportRow[], summary: ReportSummary, now: Date = new Date()): RenderedReport {
    const workbook = XLSX.utils.book_new();

    const payments = XLSX.utils.aoa_to_sheet([
        PAYMENT_HEADERS,
        ...rows.map(row => paymentCells(row, fromHalalas)),
        totalCells(sumRows(rows), fromHalalas),
    ]);
    payments['!cols'] = PAYMENT_HEADERS.map(header => ({ wch: Math.max(12, header.length + 2) }));
    XLSX.utils.book_append_sheet(workbook, payments, 'Payments');

    const overview = XLSX.utils.aoa_to_sheet([
        ['Metric', 'Value'],
        ['Payments', summary.count],
        ['Total amount (SAR)', fromHalalas(summary.totals.amount)],
        ['Company commission (SAR)', fromHalalas(summary.totals.companyCommission)],
        ['VAT on commission (SAR)', fromHalalas(summary.totals.vatOnCommission)],
        ['Net to owners (SAR)', fromHalalas(summary.totals.netToOwner)],
        ['Average payment (SAR)', fromHalalas(summary.averagePayment)],
        ['Average commission (SAR)', fromHalalas(summary.averageCommission)],
        ['Commission (%)', summary.commissionPercentage],
        ['Paid by tenants (SAR)', fromHalalas(summary.byPayerType.tenant.amount)],
        ['Paid by owners (SAR)', fromHalalas(summary.byPayerType.owner.amount)],
    ]);
    overview['!cols'] = [{ wch: 28 }, { wch: 18 }];
    XLSX.utils.book_append_sheet(workbook, overview, 'Summary');

    const projects = XLSX.utils.aoa_to_sheet([
        ['Project', 'Payments', 'Amount (SAR)', 'Commission (SAR)'],
        ...summary.byProject.map(p => [p.label, p.count, fromHalalas(p.amount), fromHalalas(p.companyCommission)]),
    ]);
    XLSX.utils.book_append_sheet(workbook, projects, 'By project');

    const months = XLSX.utils.aoa_to_sheet([
        ['Month', 'Payments', 'Amount (SAR)', 'Commission (SAR)'],
        ...summary.monthly.map(m => [m.key, m.count, fromHalalas(m.amount), fromHalalas(m.companyCommission)]),
    ]);
    XLSX.utils.book_append_sheet(workbook, months, 'By month');

    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return {
        content: buffer,
        contentType: XLSX_CONTENT_TYPE,
        fileName: `${reportFileStem(now)}.xlsx`,
    };
}
