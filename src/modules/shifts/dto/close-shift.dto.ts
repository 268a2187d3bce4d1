// src/modules/shifts/dto/close-shift.dto.ts
import { IsNotEmpty, IsNumber, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class CloseShiftDto {
    @IsNumber({ maxDecimalPlaces: 2 }, { message: 'Counted cash must be a number with at most 2 decimals.' })
    @Min(0, { message: 'Counted cash cannot be negative.' })
    @Max(9999999999.99, { message: 'Counted cash cannot exceed 9999999999.99.' })
    @IsNotEmpty({ message: 'Counted cash (endCashActual) is required.' })
    @Type(() => Number)
    endCashActual!: number;
}
