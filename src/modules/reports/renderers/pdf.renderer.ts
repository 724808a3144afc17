import PDFDocument from 'pdfkit';
import { RenderedReport, ReportRow, ReportSummary } from '../report.types';
import { sumRows } from '../report-summary';
import { reportFileStem } from './table';
import { formatSar } from '../../../common/utils/money.util';
import { describeFilter } from './text.renderer';

const COLUMNS: { title: string; width: number; align?: 'right' }[] = [
    { title: 'Date', width: 62 },
    { title: 'Project / Unit', width: 150 },
    { title: 'Payer', width: 45 },
    { title: 'Amount', width: 70, align: 'right' },
    { title: 'Commission', width: 60, align: 'right' },
    { title: 'VAT', width: 50, align: 'right' },
    { title: 'Net', width: 70, align: 'right' },
];

function drawRow(doc: PDFKit.PDFDocument, cells: string[], bold = false) {
    if (doc.y > doc.page.height - doc.page.margins.bottom - 20) {
        doc.addPage();
    }
    const y = doc.y;
    let x = doc.page.margins.left;
    doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(8);
    cells.forEach((cell, index) => {
        const column = COLUMNS[index];
        doc.text(cell, x, y, { width: column.width - 4, align: column.align ?? 'left', lineBreak: false, ellipsis: true });
        x += column.width;
    });
    doc.x = doc.page.margins.left;
    doc.y = y + 14;
}

export function renderPdf(rows: ReportRow[], summary: ReportSummary, now: Date = new Date()): Promise<RenderedReport> {
    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({ size: 'A4', margin: 40 });
        const chunks: Buffer[] = [];

        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve({
            content: Buffer.concat(chunks),
            contentType: 'application/pdf',
            fileName: `${reportFileStem(now)}.pdf`,
        }));
        doc.on('error', reject);

        // Header
        doc.fontSize(16).font('Helvetica-Bold').text('Payments Report', { align: 'center' });
        doc.fontSize(9).font('Helvetica').text(`Generated ${summary.generatedAt.slice(0, 19).replace('T', ' ')} UTC`, { align: 'center' });
        doc.text(describeFilter(summary.filter), { align: 'center' });
        doc.moveDown();

        // Summary
        doc.fontSize(12).font('Helvetica-Bold').text('Summary');
        doc.font('Helvetica').fontSize(10);
        doc.text(`Payments: ${summary.count}`);
        doc.text(`Total amount: ${formatSar(summary.totals.amount)} SAR`);
        doc.text(`Company commission: ${formatSar(summary.totals.companyCommission)} SAR (${summary.commissionPercentage}%)`);
        doc.text(`VAT on commission: ${formatSar(summary.totals.vatOnCommission)} SAR`);
        doc.text(`Net to owners: ${formatSar(summary.totals.netToOwner)} SAR`);
        doc.text(`Average payment: ${formatSar(summary.averagePayment)} SAR`);
        doc.moveDown();

        if (summary.byProject.length > 0) {
            doc.fontSize(12).font('Helvetica-Bold').text('By project');
            doc.font('Helvetica').fontSize(10);
            for (const project of summary.byProject) {
                doc.text(`${project.label}: ${formatSar(project.amount)} SAR (${project.count} payments)`);
            }
            doc.moveDown();
        }

        // Payments table
        doc.fontSize(12).font('Helvetica-Bold').text('Payments');
        doc.moveDown(0.5);
        drawRow(doc, COLUMNS.map(c => c.title), true);
        for (const row of rows) {
            drawRow(doc, [
                row.paidOn,
                [row.projectName, row.unitNumber].filter(Boolean).join(' / '),
                row.payerType,
                formatSar(row.amount),
                formatSar(row.companyCommission),
                formatSar(row.vatOnCommission),
                formatSar(row.netToOwner),
            ]);
        }
        const totals = sumRows(rows);
        drawRow(doc, [
            'Total',
            '',
            '',
            formatSar(totals.amount),
            formatSar(totals.companyCommission),
            formatSar(totals.vatOnCommission),
            formatSar(totals.netToOwner),
        ], true);

        doc.end();
    });
}
