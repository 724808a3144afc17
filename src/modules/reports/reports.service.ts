import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Payment } from '../payments/entities/payment.entity';
import { applyPaymentFilter } from '../payments/payment-filter';
import { calculateCommission } from '../payments/commission.calculator';
import { RenderedReport, ReportFilter, ReportFormat, ReportRow, ReportSummary } from './report.types';
import { summarize } from './report-summary';
import { renderCsv } from './renderers/csv.renderer';
import { renderExcel } from './renderers/excel.renderer';
import { renderPdf } from './renderers/pdf.renderer';
import { renderText } from './renderers/text.renderer';

function toRow(payment: Payment): ReportRow {
    const commission = payment.commission
        ?? calculateCommission(payment.amount, payment.companyRateBp, payment.vatRateBp);
    return {
        paymentId: payment.id,
        paidOn: payment.paidOn,
        contractNumber: payment.contract?.contractNumber ?? null,
        projectId: payment.unit?.projectId ?? null,
        projectName: payment.unit?.project?.name ?? null,
        unitNumber: payment.unit?.unitNumber ?? null,
        ownerName: payment.unit?.owner?.name ?? null,
        payerType: payment.payerType,
        description: payment.description,
        amount: payment.amount,
        companyCommission: commission.companyCommission,
        vatOnCommission: commission.vatOnCommission,
        netToOwner: commission.netToOwner,
    };
}

@Injectable()
export class ReportsService {
    private readonly logger = new Logger(ReportsService.name);

    constructor(
        @InjectRepository(Payment)
        private payments: Repository<Payment>,
    ) { }

    async rows(filter: ReportFilter): Promise<ReportRow[]> {
        if (filter.from && filter.to && filter.from > filter.to) {
            throw new BadRequestException('"from" must not be after "to"');
        }

        const qb = this.payments.createQueryBuilder('payment')
            .leftJoinAndSelect('payment.commission', 'commission')
            .leftJoinAndSelect('payment.contract', 'contract')
            .leftJoinAndSelect('payment.unit', 'unit')
            .leftJoinAndSelect('unit.project', 'project')
            .leftJoinAndSelect('unit.owner', 'owner')
            .orderBy('payment.paidOn', 'ASC')
            .addOrderBy('payment.createdAt', 'ASC');
        applyPaymentFilter(qb, filter);

        const payments = await qb.getMany();
        return payments.map(toRow);
    }

    async summary(filter: ReportFilter, now: Date = new Date()): Promise<ReportSummary> {
        return summarize(await this.rows(filter), filter, now);
    }

    async render(format: ReportFormat, filter: ReportFilter, now: Date = new Date()): Promise<RenderedReport> {
        const rows = await this.rows(filter);
        const summary = summarize(rows, filter, now);
        this.logger.debug(`Rendering ${format} report with ${rows.length} payments`);

        switch (format) {
            case 'csv':
                return renderCsv(rows, now);
            case 'excel':
                return renderExcel(rows, summary, now);
            case 'pdf':
                return renderPdf(rows, summary, now);
            case 'text':
                return renderText(summary, now);
        }
    }
}
