// src/modules/shifts/dto/open-shift.dto.ts
import { IsInt, IsNotEmpty, IsNumber, IsOptional, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class OpenShiftDto {
    @IsInt({ message: 'Employee ID must be an integer.' })
    @Min(1)
    @IsNotEmpty({ message: 'Employee ID is required.' })
    @Type(() => Number)
    employeeId!: number;

    @IsNumber({ maxDecimalPlaces: 2 }, { message: 'Start cash must be a number with at most 2 decimals.' })
    @Min(0, { message: 'Start cash cannot be negative.' })
    @Max(9999999999.99, { message: 'Start cash cannot exceed 9999999999.99.' })
    @IsOptional()
    @Type(() => Number)
    startCash?: number; // float in the drawer, defaults to 0
}
