import { Global, Module } from '@nestjs/common';

import { RateLimitService } from './application/rate-limit.service';
import { RateLimitGuard } from './guards/rate-limit.guard';

/**
 * Rate limit por rol. Global para que RateLimitGuard se pueda usar en
 * cualquier controlador.
 */
@Global()
@Module({
  providers: [RateLimitService, RateLimitGuard],
  exports: [RateLimitService, RateLimitGuard],
})
export class RateLimitModule {}
