import { Module } from '@nestjs/common';

import { EndpointsModule } from '../endpoints/endpoints.module';
import { RealtimeModule } from '../realtime/realtime.module';
import { HealthController } from './health.controller';

@Module({
  imports: [EndpointsModule, RealtimeModule],
  controllers: [HealthController],
})
export class HealthModule {}
