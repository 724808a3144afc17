import { OmitType, PartialType } from '@nestjs/mapped-types';
import { CreatePaymentDto } from './create-payment.dto';

export class UpdatePaymentDto extends PartialType(OmitType(CreatePaymentDto, ['contractId'] as const)) { }
