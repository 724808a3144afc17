import { OmitType, PartialType } from '@nestjs/mapped-types';
import { CreateContractDto } from './create-contract.dto';

// Unit and tenant are fixed once the contract exists
export class UpdateContractDto extends PartialType(OmitType(CreateContractDto, ['unitId', 'tenantId'] as const)) { }
