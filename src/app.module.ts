import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './common/config/env.validation';
import { HealthModule } from './modules/health/health.module';
import { OrderStatusModule } from './modules/order-status/order-status.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    HealthModule,
    OrderStatusModule,
  ],
})
export class AppModule {}
