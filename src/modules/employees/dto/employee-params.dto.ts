// src/modules/employees/dto/employee-params.dto.ts
import { IsInt, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class EmployeeIdParamsDto {
    @IsInt({ message: 'Employee ID must be an integer.' })
    @Min(1)
    @Type(() => Number)
    employeeId!: number;
}
