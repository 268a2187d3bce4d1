// src/modules/handovers/dto/process-handover.dto.ts
import { ArrayMaxSize, ArrayNotEmpty, IsArray, IsInt, IsNotEmpty, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class ProcessHandoverDto {
    @IsInt({ message: 'Employee ID must be an integer.' })
    @Min(1)
    @IsNotEmpty({ message: 'Employee ID is required.' })
    @Type(() => Number)
    employeeId!: number;

    @IsArray()
    @ArrayNotEmpty({ message: 'Select at least one order.' })
    @ArrayMaxSize(500)
    @IsInt({ each: true, message: 'Order IDs must be integers.' })
    @Type(() => Number)
    orderIds!: number[];
}
