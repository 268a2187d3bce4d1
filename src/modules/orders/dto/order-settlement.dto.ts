// src/modules/orders/dto/order-settlement.dto.ts
import { IsInt, IsNotEmpty, IsOptional, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class CompleteOrderDto {
    /** Employee who moved the order to completed; their open shift is preferred. */
    @IsInt() @Min(1) @IsOptional() @Type(() => Number)
    actingEmployeeId?: number;
}

export class LinkOrderDto {
    @IsInt() @Min(1) @IsOptional() @Type(() => Number)
    preferredEmployeeId?: number;
}

export class RegisterDebtDto {
    @IsInt({ message: 'Employee ID must be an integer.' })
    @Min(1)
    @IsNotEmpty({ message: 'Employee ID is required.' })
    @Type(() => Number)
    employeeId!: number;
}
