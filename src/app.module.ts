import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';

// GLOBAL MODULES
import { GlobalConfigModule } from './@common/config/config.module';
import { GlobalDatabaseModule } from './@common/database-manager/database.module';
import { GlobalRedisModule } from './@common/redis/redis.module';
import { GlobalLockModule } from './@common/lock-manager/lock-manager.module';
import { GlobalKafkaModule } from './@common/kafka/kafka.module';
import { GlobalResilienceModule } from './@common/resilience/resilience.module';

// APP MODULES
import { OrderModule } from './order/order.module';

@Module({
  imports: [
    // GLOBAL
    GlobalConfigModule,
    GlobalDatabaseModule,
    GlobalRedisModule,
    GlobalLockModule,
    GlobalKafkaModule,
    GlobalResilienceModule,
    EventEmitterModule.forRoot(),

    // APP MODULES
    OrderModule,
  ],
})
export class AppModule {}
