import { Global, Module } from '@nestjs/common';
import { ClsModule } from 'nestjs-cls';

import { AsyncContextService } from '../common/context/async-context.service';

/**
 * SharedContextModule: contexto async por request con nestjs-cls.
 *
 * Debe importarse primero en AppModule para que ClsService esté disponible
 * antes que los módulos que dependen de él. El requestId lo fija
 * RequestIdMiddleware.
 */
@Global()
@Module({
  imports: [
    ClsModule.forRoot({
      middleware: {
        // Automount ClsMiddleware para todas las rutas
        mount: true,
        generateId: true,
      },
    }),
  ],
  providers: [AsyncContextService],
  exports: [ClsModule, AsyncContextService],
})
export class SharedContextModule {}
