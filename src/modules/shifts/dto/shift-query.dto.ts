// src/modules/shifts/dto/shift-query.dto.ts
import { IsBoolean, IsDateString, IsInt, IsOptional, Max, Min } from 'class-validator';
import { Transform, Type } from 'class-transformer';

const toBoolean = ({ value }: { value: unknown }): unknown => {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
};

export class ShiftQueryDto {
    @IsInt() @Min(1) @IsOptional() @Type(() => Number)
    employeeId?: number;

    @IsBoolean({ message: 'isClosed must be true or false.' }) @IsOptional() @Transform(toBoolean)
    isClosed?: boolean;

    @IsDateString({}, { message: 'dateFrom must be an ISO date.' }) @IsOptional()
    dateFrom?: string;

    @IsDateString({}, { message: 'dateTo must be an ISO date.' }) @IsOptional()
    dateTo?: string;

    @IsInt() @Min(1) @IsOptional() @Type(() => Number)
    page?: number;

    @IsInt() @Min(1) @Max(100) @IsOptional() @Type(() => Number)
    limit?: number;
}

export class OpenShiftQueryDto {
    @IsInt({ message: 'Employee ID must be an integer.' }) @Min(1) @IsOptional() @Type(() => Number)
    employeeId?: number;
}
