// src/modules/reports/dto/report-query.dto.ts
import { IsDateString, IsOptional } from 'class-validator';

/** Whole-day range shared by the report endpoints. */
export class ReportRangeQueryDto {
    @IsDateString({}, { message: 'dateFrom must be a date in YYYY-MM-DD format.' })
    @IsOptional()
    dateFrom?: string;

    @IsDateString({}, { message: 'dateTo must be a date in YYYY-MM-DD format.' })
    @IsOptional()
    dateTo?: string;
}
