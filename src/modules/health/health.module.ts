import { Module } from '@nestjs/common';
import { OrderStatusModule } from '../order-status/order-status.module';
import { HealthController } from './health.controller';

@Module({
  imports: [OrderStatusModule],
  controllers: [HealthController],
})
export class HealthModule {}
