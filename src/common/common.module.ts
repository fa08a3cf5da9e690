// Nest Modules
import { Module } from '@nestjs/common';

// Modules
import { CryptoModule } from './crypto/crypto.module';
import { MetricsModule } from './metrics/metrics.module';

@Module({
  imports: [CryptoModule, MetricsModule],
  exports: [CryptoModule, MetricsModule],
})
export class CommonModule {}
