// src/modules/cash-transactions/dto/record-transaction.dto.ts
import { IsIn, IsNotEmpty, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { MANUAL_TRANSACTION_KINDS, type ManualTransactionKind } from '@/db/ledger.store';

export class RecordTransactionDto {
    @IsNumber({ maxDecimalPlaces: 2 }, { message: 'Amount must be a number with at most 2 decimals.' })
    @Min(0.01, { message: 'Amount must be positive.' })
    @Max(9999999999.99, { message: 'Amount cannot exceed 9999999999.99.' })
    @IsNotEmpty({ message: 'Amount cannot be empty.' })
    @Type(() => Number)
    amount!: number;

    // handover_in is written by the handover flow only
    @IsIn(MANUAL_TRANSACTION_KINDS, { message: 'Kind must be either manual_in or manual_out.' })
    @IsNotEmpty({ message: 'Kind is required.' })
    kind!: ManualTransactionKind;

    @IsString()
    @MaxLength(255)
    @IsOptional()
    comment?: string;
}
