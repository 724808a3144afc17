import { RenderedReport, ReportFilter, ReportSummary } from '../report.types';
import { reportFileStem } from './table';
import { formatSar } from '../../../common/utils/money.util';

export function describeFilter(filter: ReportFilter): string {
    const parts: string[] = [];
    if (filter.from || filter.to) {
        parts.push(`Period: ${filter.from ?? 'start'} to ${filter.to ?? 'today'}`);
    }
    if (filter.projectId) parts.push(`Project: ${filter.projectId}`);
    if (filter.ownerId) parts.push(`Owner: ${filter.ownerId}`);
    if (filter.payerType) parts.push(`Payer: ${filter.payerType}`);
    return parts.length > 0 ? parts.join(' | ') : 'All payments';
}

export function summaryText(summary: ReportSummary): string {
    const sar = (halalas: number) => `${formatSar(halalas)} SAR`;
    const lines: string[] = [
        'PAYMENTS REPORT',
        '='.repeat(40),
        describeFilter(summary.filter),
        `Generated: ${summary.generatedAt}`,
        '',
        'TOTALS',
        `  Payments:            ${summary.count}`,
        `  Total amount:        ${sar(summary.totals.amount)}`,
        `  Company commission:  ${sar(summary.totals.companyCommission)}`,
        `  VAT on commission:   ${sar(summary.totals.vatOnCommission)}`,
        `  Net to owners:       ${sar(summary.totals.netToOwner)}`,
        `  Average payment:     ${sar(summary.averagePayment)}`,
        `  Average commission:  ${sar(summary.averageCommission)}`,
        `  Commission share:    ${summary.commissionPercentage}%`,
        '',
        'BY PAYER',
        `  Tenants: ${summary.byPayerType.tenant.count} payments, ${sar(summary.byPayerType.tenant.amount)}`,
        `  Owners:  ${summary.byPayerType.owner.count} payments, ${sar(summary.byPayerType.owner.amount)}`,
    ];

    if (summary.byProject.length > 0) {
        lines.push('', 'BY PROJECT');
        for (const project of summary.byProject) {
            lines.push(`  ${project.label}: ${sar(project.amount)} (${project.count} payments)`);
        }
    }

    if (summary.monthly.length > 0) {
        lines.push('', 'BY MONTH');
        for (const month of summary.monthly) {
            lines.push(`  ${month.key}: ${sar(month.amount)} (${month.count} payments)`);
        }
    }

    if (summary.quarterly.length > 0) {
        lines.push('', 'BY QUARTER');
        for (const quarter of summary.quarterly) {
            lines.push(`  ${quarter.key}: ${sar(quarter.amount)} (${quarter.count} payments)`);
        }
    }

    if (summary.growth) {
        const change = summary.growth.percentage === null ? 'n/a' : `${summary.growth.percentage}%`;
        lines.push('', `GROWTH ${summary.growth.from} -> ${summary.growth.to}: ${change}`);
    }

    if (summary.topPayments.length > 0) {
        lines.push('', 'TOP PAYMENTS');
        summary.topPayments.forEach((row, index) => {
            const where = [row.projectName, row.unitNumber].filter(Boolean).join(' / ');
            lines.push(`  ${index + 1}. ${row.paidOn} ${sar(row.amount)} ${where}`.trimEnd());
        });
    }

    return lines.join('\n') + '\n';
}

export function renderText(summary: ReportSummary, now: Date = new Date()): RenderedReport {
    return {
        content: Buffer.from(summaryText(summary), 'utf8'),
        contentType: 'text/plain; charset=utf-8',
        fileName: `${reportFileStem(now)}.txt`,
    };
}
