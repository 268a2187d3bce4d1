// src/modules/shifts/dto/shift-params.dto.ts
import { IsInt, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class ShiftIdParamsDto {
    @IsInt({ message: 'Shift ID must be an integer.' })
    @Min(1)
    @Type(() => Number)
    shiftId!: number;
}
