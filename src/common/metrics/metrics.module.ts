import { Global, Module } from '@nestjs/common';

import { INJECTION_TOKENS } from '../constants/injection-tokens';
import { InMemoryMetricsSink } from './in-memory-metrics.sink';

@Global()
@Module({
  providers: [
    {
      provide: INJECTION_TOKENS.METRICS_SINK,
      useClass: InMemoryMetricsSink,
    },
  ],
  exports: [INJECTION_TOKENS.METRICS_SINK],
})
export class MetricsModule {}
