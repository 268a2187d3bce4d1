// src/modules/orders/dto/order-params.dto.ts
import { IsInt, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class OrderIdParamsDto {
    @IsInt({ message: 'Order ID must be an integer.' })
    @Min(1)
    @Type(() => Number)
    orderId!: number;
}
